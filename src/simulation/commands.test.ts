import { applyCommand, commandForKey, KEY_HELP } from "./commands";
import { Simulation } from "./simulation";
import { TickScheduler } from "./tick-scheduler";
import { ALIVE } from "../types/grid-types";

describe("commandForKey", () => {
  it("maps cursor keys onto the three axes", () => {
    expect(commandForKey("ArrowLeft")).toEqual({ type: "move-cursor", axis: "x", delta: -1 });
    expect(commandForKey("ArrowUp")).toEqual({ type: "move-cursor", axis: "y", delta: 1 });
    expect(commandForKey("PageDown")).toEqual({ type: "move-cursor", axis: "z", delta: -1 });
    expect(commandForKey("e")).toEqual({ type: "move-cursor", axis: "z", delta: 1 });
  });

  it("is case-insensitive for letter keys", () => {
    expect(commandForKey("D")).toEqual({ type: "move-cursor", axis: "x", delta: 1 });
    expect(commandForKey("P")).toEqual({ type: "toggle-pause" });
  });

  it("maps the editing and pacing keys", () => {
    expect(commandForKey(" ")).toEqual({ type: "flip-cell" });
    expect(commandForKey("+")).toEqual({ type: "increase-speed" });
    expect(commandForKey("=")).toEqual({ type: "increase-speed" });
    expect(commandForKey("-")).toEqual({ type: "decrease-speed" });
    expect(commandForKey("n")).toEqual({ type: "step-once" });
  });

  it("returns null for unbound keys", () => {
    expect(commandForKey("x")).toBeNull();
    expect(commandForKey("Escape")).toBeNull();
    expect(commandForKey("toString")).toBeNull();
  });

  it("has a help entry for every command kind", () => {
    expect(KEY_HELP.length).toBe(7);
  });
});

describe("applyCommand", () => {
  function setup() {
    const sim = new Simulation(6);
    const scheduler = new TickScheduler(() => sim.step());
    return { sim, scheduler };
  }

  it("moves the cursor", () => {
    const { sim, scheduler } = setup();
    applyCommand(sim, scheduler, { type: "move-cursor", axis: "y", delta: 1 });
    expect([sim.cursor.x, sim.cursor.y, sim.cursor.z]).toEqual([3, 4, 3]);
  });

  it("flips the cursor cell", () => {
    const { sim, scheduler } = setup();
    applyCommand(sim, scheduler, { type: "flip-cell" });
    expect(sim.grid.get(3, 3, 3)).toBe(ALIVE);
  });

  it("toggles pause and adjusts speed on the scheduler", () => {
    const { sim, scheduler } = setup();
    applyCommand(sim, scheduler, { type: "toggle-pause" });
    expect(scheduler.paused).toBe(true);
    applyCommand(sim, scheduler, { type: "increase-speed" });
    applyCommand(sim, scheduler, { type: "increase-speed" });
    expect(scheduler.speed).toBe(3);
    applyCommand(sim, scheduler, { type: "decrease-speed" });
    expect(scheduler.speed).toBe(2);
  });

  it("steps once regardless of pause", () => {
    const { sim, scheduler } = setup();
    applyCommand(sim, scheduler, { type: "toggle-pause" });
    applyCommand(sim, scheduler, { type: "step-once" });
    expect(sim.generation).toBe(1);
  });
});
