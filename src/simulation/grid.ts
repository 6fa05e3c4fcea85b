import { ARENA_SIZE, MIN_GRID_SIZE } from "../constants";
import { ALIVE, Cell, DEAD, IGrid } from "../types/grid-types";
import { cellIndex } from "../utils/grid-utils";

/**
 * Dense N×N×N arena of cell states.
 *
 * Coordinates must already be in [0, N). Out-of-range access is a caller
 * defect and throws instead of wrapping.
 */
export class Grid implements IGrid {
  readonly size: number;
  readonly cells: Uint8Array;

  constructor(size = ARENA_SIZE) {
    if (!Number.isInteger(size) || size < MIN_GRID_SIZE) {
      throw new RangeError(`Grid size must be an integer of at least ${MIN_GRID_SIZE}, got ${size}`);
    }
    this.size = size;
    this.cells = new Uint8Array(size * size * size);
  }

  idx(x: number, y: number, z: number): number {
    this.assertInRange(x, y, z);
    return cellIndex(x, y, z, this.size);
  }

  get(x: number, y: number, z: number): Cell {
    return this.cells[this.idx(x, y, z)] ? ALIVE : DEAD;
  }

  set(x: number, y: number, z: number, cell: Cell): void {
    this.cells[this.idx(x, y, z)] = cell;
  }

  isAlive(x: number, y: number, z: number): boolean {
    return this.get(x, y, z) === ALIVE;
  }

  liveCount(): number {
    let count = 0;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i]) count++;
    }
    return count;
  }

  clear(): void {
    this.cells.fill(DEAD);
  }

  clone(): Grid {
    const copy = new Grid(this.size);
    copy.cells.set(this.cells);
    return copy;
  }

  equals(other: IGrid): boolean {
    if (other.size !== this.size) return false;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] !== other.cells[i]) return false;
    }
    return true;
  }

  private assertInRange(x: number, y: number, z: number): void {
    const n = this.size;
    const ok = (c: number) => Number.isInteger(c) && c >= 0 && c < n;
    if (!ok(x) || !ok(y) || !ok(z)) {
      throw new RangeError(`Cell (${x}, ${y}, ${z}) is outside the ${n}³ arena`);
    }
  }
}
