import { Grid } from "./grid";
import { livingNeighbours } from "./neighbors";
import { nextCellState } from "./rules";
import { ALIVE, DEAD } from "../types/grid-types";

/**
 * Compute the next generation.
 *
 * Every neighbour count is read from `current`; results go into a freshly
 * allocated all-dead grid, so no cell ever sees a partially updated
 * neighbourhood. `current` is left untouched.
 */
export function stepGeneration(current: Grid): Grid {
  const n = current.size;
  const next = new Grid(n);
  const src = current.cells;
  const dst = next.cells;

  let i = 0;
  for (let x = 0; x < n; x++) {
    for (let y = 0; y < n; y++) {
      for (let z = 0; z < n; z++, i++) {
        const state = src[i] === ALIVE ? ALIVE : DEAD;
        dst[i] = nextCellState(state, livingNeighbours(current, x, y, z));
      }
    }
  }

  return next;
}
