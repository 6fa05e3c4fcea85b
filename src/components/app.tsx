import React, { useState, useEffect, useRef, useCallback, useMemo } from "react";
import { SimulationCanvas, SimStatus, ViewMode, CommandDispatcher } from "./simulation-canvas";
import { SEED_PRESETS, SeedPreset, isSeedPreset } from "../simulation/seed-presets";
import { KEY_HELP, SimCommand } from "../simulation/commands";
import { ruleLabel } from "../simulation/rules";
import { readSimConfig } from "../utils/sim-config";
import { MAX_SPEED, MIN_SPEED } from "../constants";

import "./app.scss";

const PRESET_LABELS: Record<SeedPreset, string> = {
  "empty": "Empty",
  "random-soup": "Random Soup",
  "centre-block": "Centre Block",
  "cross": "Cross",
};

export const App = () => {
  const config = useMemo(() => readSimConfig(window.location.search), []);
  const [preset, setPreset] = useState<SeedPreset>(config.preset);
  const [seedVersion, setSeedVersion] = useState(0);
  const [viewMode, setViewMode] = useState<ViewMode>("scene");
  const [showBounds, setShowBounds] = useState(true);
  const [showHelp, setShowHelp] = useState(false);
  const [status, setStatus] = useState<SimStatus | null>(null);

  const controlsRef = useRef<HTMLDivElement>(null);
  const dispatchRef = useRef<CommandDispatcher | null>(null);
  const [canvasSize, setCanvasSize] = useState({ width: 800, height: 600 });

  const updateCanvasSize = useCallback(() => {
    const controlsHeight = controlsRef.current?.offsetHeight ?? 0;
    setCanvasSize({
      width: window.innerWidth,
      height: window.innerHeight - controlsHeight,
    });
  }, []);

  useEffect(() => {
    updateCanvasSize();
    window.addEventListener("resize", updateCanvasSize);
    return () => window.removeEventListener("resize", updateCanvasSize);
  }, [updateCanvasSize]);

  const send = (command: SimCommand) => dispatchRef.current?.(command);

  const paused = status?.paused ?? false;
  const speed = status?.speed ?? MIN_SPEED;

  // Build status string
  const statusParts: string[] = [];
  if (status) {
    const [cx, cy, cz] = status.cursor;
    statusParts.push(`gen ${status.generation}`);
    statusParts.push(`${status.liveCells} alive`);
    statusParts.push(`${status.metrics.drawnCells} drawn`);
    statusParts.push(`cursor (${cx}, ${cy}, ${cz})`);
    statusParts.push(`${Math.round(status.metrics.fps)} fps`);
    statusParts.push(`step ${status.metrics.stepTimeMs.toFixed(1)}ms`);
    statusParts.push(`draw ${status.metrics.sceneUpdateTimeMs.toFixed(1)}ms`);
  }

  return (
    <div className="app">
      <div className="controls" ref={controlsRef}>
        <button onClick={() => send({ type: "toggle-pause" })}>{paused ? "Play" : "Pause"}</button>
        <button onClick={() => send({ type: "step-once" })}>Step</button>
        <label>
          Speed: {speed}x
          <button onClick={() => send({ type: "decrease-speed" })} disabled={speed <= MIN_SPEED}>-</button>
          <button onClick={() => send({ type: "increase-speed" })} disabled={speed >= MAX_SPEED}>+</button>
        </label>
        <label>
          Seed:
          <select value={preset} onChange={e => { if (isSeedPreset(e.target.value)) setPreset(e.target.value); }}>
            {SEED_PRESETS.map(p => <option key={p} value={p}>{PRESET_LABELS[p]}</option>)}
          </select>
        </label>
        <button onClick={() => setSeedVersion(v => v + 1)}>Reseed</button>
        <label>
          View:
          <select value={viewMode}
            onChange={e => setViewMode(e.target.value === "slice" ? "slice" : "scene")}>
            <option value="scene">3D Arena</option>
            <option value="slice">Cursor Slice</option>
          </select>
        </label>
        <label>
          <input type="checkbox" checked={showBounds}
            onChange={e => setShowBounds(e.target.checked)} />
          Show bounds
        </label>
        <button onClick={() => setShowHelp(h => !h)}>Keys</button>
        <span className="rule-label">Rule {ruleLabel()} · {config.arenaSize}³</span>
      </div>
      <div className="canvas-container">
        <SimulationCanvas
          width={canvasSize.width}
          height={canvasSize.height}
          arenaSize={config.arenaSize}
          preset={preset}
          randomSeed={config.randomSeed}
          seedVersion={seedVersion}
          viewMode={viewMode}
          showBounds={showBounds}
          dispatchRef={dispatchRef}
          onStatus={setStatus}
        />
        <div className="legend-overlay">
          {statusParts.length > 0 && <div>{statusParts.join(" | ")}</div>}
        </div>
        {showHelp && (
          <dl className="key-help">
            {KEY_HELP.map(([keys, action]) => (
              <React.Fragment key={keys}>
                <dt>{keys}</dt>
                <dd>{action}</dd>
              </React.Fragment>
            ))}
          </dl>
        )}
      </div>
    </div>
  );
};
