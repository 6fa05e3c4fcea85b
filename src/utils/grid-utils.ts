/** Flat index of (x, y, z) in an N³ cell array. Does not bounds-check. */
export function cellIndex(x: number, y: number, z: number, size: number): number {
  return (x * size + y) * size + z;
}

/** Inverse of cellIndex. */
export function cellCoords(index: number, size: number): [number, number, number] {
  const z = index % size;
  const y = Math.floor(index / size) % size;
  const x = Math.floor(index / (size * size));
  return [x, y, z];
}

/**
 * World-space coordinate of a grid index along one axis. The arena is
 * centred on the origin: index 0 sits at -size/2 * cellSize.
 */
export function gridToWorld(index: number, size: number, cellSize: number): number {
  return index * cellSize - (size / 2) * cellSize;
}
