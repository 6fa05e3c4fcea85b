import { Application, Container, Graphics, GraphicsContext } from "pixi.js";
import { SCENE_BG_COLOR, SLICE_DEAD_COLOR, CURSOR_COLOR } from "../constants";
import { heightToColor, heightFraction } from "../utils/color-utils";
import { cellIndex } from "../utils/grid-utils";
import type { FrameData, Renderer, RendererOptions, RendererMetrics } from "../types/renderer-types";

/** Pixels kept free around the slice. */
const MARGIN = 16;

/**
 * Pixi.js top-down view of the single z-layer the cursor is on.
 * x runs left to right, y bottom to top.
 */
export async function createSliceRenderer(canvas: HTMLCanvasElement, arenaSize: number, width: number,
    height: number): Promise<Renderer> {
  const app = new Application();
  await app.init({ canvas, width, height, background: SCENE_BG_COLOR });
  app.ticker.stop();

  const cellContainer = new Container();
  const overlayContainer = new Container();
  app.stage.addChild(cellContainer, overlayContainer);

  // Shared cell shape: a 1×1 white filled rect at the origin, tinted per instance.
  const cellContext = new GraphicsContext();
  cellContext.rect(0, 0, 1, 1).fill({ color: 0xffffff });

  const cells: Graphics[] = [];
  for (let i = 0; i < arenaSize * arenaSize; i++) {
    const g = new Graphics(cellContext);
    cellContainer.addChild(g);
    cells.push(g);
  }

  const cursorOutline = new Graphics();
  overlayContainer.addChild(cursorOutline);

  let viewWidth = width;
  let viewHeight = height;

  let sceneUpdateTimeMs = 0;
  const emaAlpha = 0.05;

  function update(frame: FrameData, opts: RendererOptions): RendererMetrics {
    const sceneT0 = performance.now();
    const { grid, cursor } = frame;
    const n = arenaSize;
    const side = Math.max(1, Math.min(viewWidth, viewHeight) - 2 * MARGIN);
    const cellPx = side / n;
    const left = (viewWidth - side) / 2;
    const top = (viewHeight - side) / 2;
    const gap = cellPx > 4 ? 1 : 0;

    let drawn = 0;
    for (let x = 0; x < n; x++) {
      for (let y = 0; y < n; y++) {
        const g = cells[x * n + y];
        const displayRow = n - 1 - y;
        g.position.set(left + x * cellPx, top + displayRow * cellPx);
        g.scale.set(Math.max(1, cellPx - gap));
        if (grid.cells[cellIndex(x, y, cursor.z, n)]) {
          g.tint = heightToColor(heightFraction(y, n));
          drawn++;
        } else {
          g.tint = SLICE_DEAD_COLOR;
        }
      }
    }

    cursorOutline.clear();
    cursorOutline
      .rect(left + cursor.x * cellPx, top + (n - 1 - cursor.y) * cellPx, cellPx, cellPx)
      .stroke({ width: 2, color: CURSOR_COLOR });

    app.render();

    const rawSceneMs = performance.now() - sceneT0;
    sceneUpdateTimeMs = emaAlpha * rawSceneMs + (1 - emaAlpha) * sceneUpdateTimeMs;

    return {
      fps: 0,
      sceneUpdateTimeMs,
      stepTimeMs: opts.stepTimeMs,
      drawnCells: drawn,
    };
  }

  return {
    canvas,
    update,
    resize(w: number, h: number) {
      viewWidth = w;
      viewHeight = h;
      app.renderer.resize(w, h);
    },
    destroy() {
      cellContext.destroy();
      app.destroy();
    },
    savesCameraState: () => false,
    getCameraState: () => null,
  };
}
