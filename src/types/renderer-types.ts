import type { ICursor, IGrid } from "./grid-types";
import type { InstanceList } from "../simulation/instance-emitter";

export interface OrbitCameraState {
  azimuth: number;   // radians
  polar: number;     // radians
  distance: number;
}

/** Everything a renderer needs to draw one frame. Read-only for the renderer. */
export interface FrameData {
  grid: IGrid;
  cursor: ICursor;
  /** Live cells other than the cursor's, in world space. */
  instances: InstanceList;
}

export interface RendererOptions {
  width: number;
  height: number;
  showBounds: boolean;
  stepTimeMs: number;
}

export interface RendererMetrics {
  fps: number;
  sceneUpdateTimeMs: number;
  stepTimeMs: number;
  /** Number of live cells drawn this frame, the cursor's included. */
  drawnCells: number;
}

export interface Renderer {
  update(frame: FrameData, opts: RendererOptions): RendererMetrics;
  resize(width: number, height: number): void;
  destroy(): void;
  readonly canvas: HTMLCanvasElement;
  /** Returns true if this renderer saves/restores camera state across toggles. */
  savesCameraState(): boolean;
  /** Returns the current camera state, or null if not applicable. */
  getCameraState(): OrbitCameraState | null;
}
