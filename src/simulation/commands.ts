import type { Simulation } from "./simulation";
import type { TickScheduler } from "./tick-scheduler";
import type { Axis } from "../types/grid-types";

export type SimCommand =
  | { type: "move-cursor"; axis: Axis; delta: 1 | -1 }
  | { type: "flip-cell" }
  | { type: "toggle-pause" }
  | { type: "increase-speed" }
  | { type: "decrease-speed" }
  | { type: "step-once" };

const KEY_BINDINGS: Record<string, SimCommand> = {
  ArrowLeft: { type: "move-cursor", axis: "x", delta: -1 },
  ArrowRight: { type: "move-cursor", axis: "x", delta: 1 },
  a: { type: "move-cursor", axis: "x", delta: -1 },
  d: { type: "move-cursor", axis: "x", delta: 1 },
  ArrowDown: { type: "move-cursor", axis: "y", delta: -1 },
  ArrowUp: { type: "move-cursor", axis: "y", delta: 1 },
  s: { type: "move-cursor", axis: "y", delta: -1 },
  w: { type: "move-cursor", axis: "y", delta: 1 },
  PageDown: { type: "move-cursor", axis: "z", delta: -1 },
  PageUp: { type: "move-cursor", axis: "z", delta: 1 },
  q: { type: "move-cursor", axis: "z", delta: -1 },
  e: { type: "move-cursor", axis: "z", delta: 1 },
  " ": { type: "flip-cell" },
  p: { type: "toggle-pause" },
  "+": { type: "increase-speed" },
  "=": { type: "increase-speed" },
  "-": { type: "decrease-speed" },
  n: { type: "step-once" },
};

/** Key labels shown in the help panel, grouped by what they do. */
export const KEY_HELP: readonly [string, string][] = [
  ["A/D or ←/→", "move cursor on x"],
  ["S/W or ↓/↑", "move cursor on y"],
  ["Q/E or PgDn/PgUp", "move cursor on z"],
  ["Space", "flip cell"],
  ["P", "play / pause"],
  ["+ / -", "speed"],
  ["N", "single step"],
];

/** Returns the command bound to a KeyboardEvent.key value, or null. */
export function commandForKey(key: string): SimCommand | null {
  const normalized = key.length === 1 ? key.toLowerCase() : key;
  return Object.prototype.hasOwnProperty.call(KEY_BINDINGS, normalized) ? KEY_BINDINGS[normalized] : null;
}

export function applyCommand(sim: Simulation, scheduler: TickScheduler, command: SimCommand): void {
  switch (command.type) {
    case "move-cursor":
      sim.cursor.move(command.axis, command.delta);
      break;
    case "flip-cell":
      sim.flipAtCursor();
      break;
    case "toggle-pause":
      scheduler.togglePause();
      break;
    case "increase-speed":
      scheduler.increaseSpeed();
      break;
    case "decrease-speed":
      scheduler.decreaseSpeed();
      break;
    case "step-once":
      sim.step();
      break;
  }
}
