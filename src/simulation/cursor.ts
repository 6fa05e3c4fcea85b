import type { Grid } from "./grid";
import { ALIVE, Axis, DEAD, ICursor } from "../types/grid-types";

/**
 * A single addressable cell used for manual edits and highlighting.
 *
 * Moves are clamped to [0, size) so the cursor is always a valid grid
 * address; pushing against an edge leaves it on the edge.
 */
export class Cursor implements ICursor {
  x: number;
  y: number;
  z: number;
  readonly size: number;

  constructor(size: number) {
    this.size = size;
    const mid = Math.floor(size / 2);
    this.x = mid;
    this.y = mid;
    this.z = mid;
  }

  move(axis: Axis, delta: 1 | -1): void {
    const clamped = Math.max(0, Math.min(this.size - 1, this[axis] + delta));
    this[axis] = clamped;
  }

  isAt(x: number, y: number, z: number): boolean {
    return this.x === x && this.y === y && this.z === z;
  }

  /** Toggle the cell under the cursor, bypassing the update rule. */
  flipAtCursor(grid: Grid): void {
    if (grid.size !== this.size) {
      throw new RangeError(`Cursor is bound to a ${this.size}³ arena, grid is ${grid.size}³`);
    }
    const current = grid.get(this.x, this.y, this.z);
    grid.set(this.x, this.y, this.z, current === ALIVE ? DEAD : ALIVE);
  }
}
