import { Grid } from "./grid";
import { Cursor } from "./cursor";
import { stepGeneration } from "./generation";
import { ARENA_SIZE } from "../constants";

/**
 * Owns the arena and the cursor. The grid is replaced wholesale on every
 * step; callers should read `grid` afresh each frame rather than hold on to it.
 */
export class Simulation {
  readonly size: number;
  readonly cursor: Cursor;
  private _grid: Grid;
  private _generation = 0;

  constructor(size = ARENA_SIZE) {
    this.size = size;
    this._grid = new Grid(size);
    this.cursor = new Cursor(size);
  }

  get grid(): Grid {
    return this._grid;
  }

  get generation(): number {
    return this._generation;
  }

  /** Advance one generation. */
  step(): void {
    this._grid = stepGeneration(this._grid);
    this._generation++;
  }

  flipAtCursor(): void {
    this.cursor.flipAtCursor(this._grid);
  }

  /**
   * Start over from an all-dead arena, or from `cells` if given
   * (size³ entries in Grid.cells layout).
   */
  reset(cells?: Uint8Array): void {
    const grid = new Grid(this.size);
    if (cells) {
      if (cells.length !== grid.cells.length) {
        throw new RangeError(`Seed has ${cells.length} cells, arena needs ${grid.cells.length}`);
      }
      grid.cells.set(cells);
    }
    this._grid = grid;
    this._generation = 0;
  }
}
