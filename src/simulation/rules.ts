import { ALIVE, Cell, DEAD } from "../types/grid-types";

/** Neighbour counts that keep a live cell alive. */
export const SURVIVE_COUNTS: readonly number[] = [3, 5];

/** Neighbour counts that bring a dead cell to life. */
export const BIRTH_COUNTS: readonly number[] = [5];

/**
 * Next state of a cell from its current state and live neighbour count.
 *
 * Survival on 3 or 5, birth on 5. A live cell with 4 neighbours dies along
 * with every other count not listed.
 */
export function nextCellState(current: Cell, liveNeighbours: number): Cell {
  if (current === ALIVE) {
    if (liveNeighbours < 3) return DEAD;
    if (liveNeighbours === 3 || liveNeighbours === 5) return ALIVE;
    return DEAD;
  }
  return liveNeighbours === 5 ? ALIVE : DEAD;
}

/** Human-readable rule string, e.g. "S3,5/B5". */
export function ruleLabel(): string {
  return `S${SURVIVE_COUNTS.join(",")}/B${BIRTH_COUNTS.join(",")}`;
}
