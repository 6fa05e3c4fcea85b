import React, { useRef, useEffect, useState } from "react";
import { createSceneRenderer } from "../rendering/scene-renderer";
import { createSliceRenderer } from "../rendering/slice-renderer";
import type { Renderer, RendererMetrics, OrbitCameraState } from "../types/renderer-types";
import { Simulation } from "../simulation/simulation";
import { TickScheduler } from "../simulation/tick-scheduler";
import { InstanceList, emitInstances } from "../simulation/instance-emitter";
import { SeedPreset, createSeedMask, mulberry32 } from "../simulation/seed-presets";
import { SimCommand, applyCommand, commandForKey } from "../simulation/commands";
import { CELL_SIZE, STATUS_INTERVAL_MS, TARGET_FPS } from "../constants";

export type ViewMode = "scene" | "slice";

export interface SimStatus {
  generation: number;
  liveCells: number;
  speed: number;
  paused: boolean;
  cursor: [number, number, number];
  metrics: RendererMetrics;
}

export type CommandDispatcher = (command: SimCommand) => void;

interface Props {
  width: number;
  height: number;
  arenaSize: number;
  preset: SeedPreset;
  randomSeed: number;
  /** Bumped by the parent to reseed with the current preset. */
  seedVersion: number;
  viewMode: ViewMode;
  showBounds: boolean;
  dispatchRef?: React.MutableRefObject<CommandDispatcher | null>;
  onStatus?: (status: SimStatus) => void;
}

function isEditableTarget(target: EventTarget | null): boolean {
  return target instanceof HTMLInputElement || target instanceof HTMLSelectElement ||
    target instanceof HTMLTextAreaElement;
}

export const SimulationCanvas: React.FC<Props> = ({
  width, height, arenaSize, preset, randomSeed, seedVersion, viewMode, showBounds, dispatchRef, onStatus,
}) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const rendererRef = useRef<Renderer | null>(null);
  const cameraStateRef = useRef<OrbitCameraState | null>(null);
  // Built once per mount; arenaSize is fixed for the component's lifetime.
  const [sim] = useState(() => new Simulation(arenaSize));
  const [scheduler] = useState(() => new TickScheduler(() => sim.step()));
  const [instances] = useState(() => new InstanceList());
  const showBoundsRef = useRef(showBounds);
  showBoundsRef.current = showBounds;
  const sizeRef = useRef({ width, height });
  sizeRef.current = { width, height };
  const onStatusRef = useRef(onStatus);
  onStatusRef.current = onStatus;

  // Commands from the controls and the keyboard go through the same path.
  useEffect(() => {
    const dispatch: CommandDispatcher = (command) => {
      applyCommand(sim, scheduler, command);
    };
    if (dispatchRef) dispatchRef.current = dispatch;

    function onKeyDown(e: KeyboardEvent): void {
      if (isEditableTarget(e.target) || e.ctrlKey || e.metaKey || e.altKey) return;
      const command = commandForKey(e.key);
      if (!command) return;
      e.preventDefault();
      dispatch(command);
    }

    window.addEventListener("keydown", onKeyDown);
    return () => {
      window.removeEventListener("keydown", onKeyDown);
      if (dispatchRef) dispatchRef.current = null;
    };
  }, [dispatchRef, sim, scheduler]);

  // Create/recreate renderer when viewMode changes; destroy on unmount.
  // Simulation state persists across view toggles.
  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    let destroyed = false;
    let rafId = 0;

    function startRafLoop(renderer: Renderer): void {
      // Subtract 1ms tolerance so rAF timestamp jitter doesn't cause
      // occasional double-interval frames when elapsed ≈ 1000/TARGET_FPS.
      const minFrameInterval = 1000 / TARGET_FPS - 1;
      let lastFrameTime = -1;
      let lastStatusTime = -Infinity;

      function tick(timestamp: number): void {
        if (destroyed) return;

        if (lastFrameTime < 0) {
          lastFrameTime = timestamp;
        }

        const elapsed = timestamp - lastFrameTime;
        if (elapsed < minFrameInterval) {
          rafId = requestAnimationFrame(tick);
          return;
        }
        lastFrameTime = timestamp;
        const fps = elapsed > 0 ? 1000 / elapsed : 0;

        scheduler.advance(elapsed / 1000);

        // The grid may have been replaced by the step above; read it afresh.
        emitInstances(sim.grid, sim.cursor, CELL_SIZE, instances);

        const metrics = renderer.update(
          { grid: sim.grid, cursor: sim.cursor, instances },
          {
            width: sizeRef.current.width,
            height: sizeRef.current.height,
            showBounds: showBoundsRef.current,
            stepTimeMs: scheduler.stepTimeMs,
          },
        );
        metrics.fps = fps;

        const onStatusCb = onStatusRef.current;
        if (onStatusCb && timestamp - lastStatusTime >= STATUS_INTERVAL_MS) {
          lastStatusTime = timestamp;
          onStatusCb({
            generation: sim.generation,
            liveCells: sim.grid.liveCount(),
            speed: scheduler.speed,
            paused: scheduler.paused,
            cursor: [sim.cursor.x, sim.cursor.y, sim.cursor.z],
            metrics,
          });
        }

        rafId = requestAnimationFrame(tick);
      }

      rafId = requestAnimationFrame(tick);
    }

    (async () => {
      let renderer: Renderer;

      if (viewMode === "scene") {
        renderer = createSceneRenderer(arenaSize, CELL_SIZE, cameraStateRef.current ?? undefined);
        container.appendChild(renderer.canvas);
      } else {
        const canvas = document.createElement("canvas");
        container.appendChild(canvas);
        renderer = await createSliceRenderer(canvas, arenaSize, sizeRef.current.width, sizeRef.current.height);
      }

      if (destroyed) {
        renderer.destroy();
        return;
      }

      rendererRef.current = renderer;
      renderer.resize(sizeRef.current.width, sizeRef.current.height);
      startRafLoop(renderer);
    })().catch((err) => {
      console.error("Failed to initialize renderer:", err);
    });

    return () => {
      destroyed = true;
      cancelAnimationFrame(rafId);

      // Save camera state before destroying a scene renderer
      if (rendererRef.current?.savesCameraState()) {
        cameraStateRef.current = rendererRef.current.getCameraState();
      }

      rendererRef.current?.destroy();
      rendererRef.current = null;

      // Remove any child canvases from the container
      while (container.firstChild) {
        container.removeChild(container.firstChild);
      }
    };
  // eslint-disable-next-line react-hooks/exhaustive-deps
  }, [viewMode]);

  // Reseed when the preset changes or the parent asks for it
  useEffect(() => {
    const random = mulberry32(randomSeed + seedVersion);
    sim.reset(createSeedMask(preset, arenaSize, random));
  }, [sim, preset, randomSeed, seedVersion, arenaSize]);

  // Resize the renderer when dimensions change (no destroy/recreate)
  useEffect(() => {
    rendererRef.current?.resize(width, height);
  }, [width, height]);

  return <div ref={containerRef} />;
};
