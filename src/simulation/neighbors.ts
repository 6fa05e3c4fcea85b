import { ALIVE, IGrid } from "../types/grid-types";
import { cellIndex } from "../utils/grid-utils";

/**
 * Reflect-at-edge normalization of one neighbour coordinate.
 *
 * A step just past the low edge lands on N-1, a step just past the high edge
 * lands on 0. Unlike modular wrapping this is only defined for offsets in
 * {-1, 0, 1} and sizes of at least 2.
 */
export function normalizeCoord(c: number, offset: number, size: number): number {
  if (offset !== -1 && offset !== 0 && offset !== 1) {
    throw new RangeError(`Neighbour offset must be -1, 0 or 1, got ${offset}`);
  }
  const v = c + offset;
  let r = v;
  if (v < 0) r = (size - 1) + v;
  else if (v > size - 1) r = v - (size - 1);
  if (r < 0 || r >= size) {
    throw new RangeError(`Coordinate ${c}${offset < 0 ? "" : "+"}${offset} does not normalize into [0, ${size})`);
  }
  return r;
}

/** The 26 (dx, dy, dz) offsets of the 3×3×3 block minus its centre. */
export const NEIGHBOUR_OFFSETS: ReadonlyArray<readonly [number, number, number]> = (() => {
  const offsets: [number, number, number][] = [];
  for (let dx = -1; dx <= 1; dx++) {
    for (let dy = -1; dy <= 1; dy++) {
      for (let dz = -1; dz <= 1; dz++) {
        if (dx === 0 && dy === 0 && dz === 0) continue;
        offsets.push([dx, dy, dz]);
      }
    }
  }
  return offsets;
})();

/**
 * Number of live cells among the 26 neighbours of (x, y, z), in [0, 26].
 * Each offset is counted on its own, so near an edge two offsets may
 * normalize onto the same cell and both count it.
 */
export function livingNeighbours(grid: IGrid, x: number, y: number, z: number): number {
  const n = grid.size;
  const { cells } = grid;
  let count = 0;
  for (const [dx, dy, dz] of NEIGHBOUR_OFFSETS) {
    const nx = normalizeCoord(x, dx, n);
    const ny = normalizeCoord(y, dy, n);
    const nz = normalizeCoord(z, dz, n);
    if (cells[cellIndex(nx, ny, nz, n)] === ALIVE) count++;
  }
  return count;
}
