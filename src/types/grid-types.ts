export const DEAD = 0;
export const ALIVE = 1;

/** State of a single cell. Stored as one byte per cell. */
export type Cell = typeof DEAD | typeof ALIVE;

export type Axis = "x" | "y" | "z";

/**
 * Read-only interface for the simulation grid.
 * Used by rendering and utility code that reads grid state without modifying it.
 */
export interface IGrid {
  /** Cells per axis (N). */
  readonly size: number;
  /** N³ cell states, indexed (x * N + y) * N + z. */
  readonly cells: Uint8Array;
  get(x: number, y: number, z: number): Cell;
}

/** Read-only view of the cursor position. */
export interface ICursor {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}
