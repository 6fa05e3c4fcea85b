import { ALIVE, ICursor, IGrid } from "../types/grid-types";
import { gridToWorld } from "../utils/grid-utils";

/** Receiver of per-frame instance positions (the renderer side). */
export interface InstanceSink {
  clearInstances(): void;
  addInstance(x: number, y: number, z: number): void;
}

/**
 * Flat list of world-space instance positions, rebuilt every frame.
 * Storage grows on demand and is reused between frames.
 */
export class InstanceList implements InstanceSink {
  positions: Float32Array;
  private _count = 0;

  constructor(initialCapacity = 256) {
    this.positions = new Float32Array(Math.max(1, initialCapacity) * 3);
  }

  get count(): number {
    return this._count;
  }

  clearInstances(): void {
    this._count = 0;
  }

  addInstance(x: number, y: number, z: number): void {
    const offset = this._count * 3;
    if (offset + 3 > this.positions.length) {
      const grown = new Float32Array(this.positions.length * 2);
      grown.set(this.positions);
      this.positions = grown;
    }
    this.positions[offset] = x;
    this.positions[offset + 1] = y;
    this.positions[offset + 2] = z;
    this._count++;
  }

  at(i: number): [number, number, number] {
    if (i < 0 || i >= this._count) {
      throw new RangeError(`Instance ${i} out of range (count ${this._count})`);
    }
    const o = i * 3;
    return [this.positions[o], this.positions[o + 1], this.positions[o + 2]];
  }
}

/**
 * Walk the whole grid and emit a world-space position for every live cell
 * except the one under the cursor, which is drawn separately.
 *
 * Order is x-major, then y, then z. Returns the number of instances emitted.
 */
export function emitInstances(grid: IGrid, cursor: ICursor, cellSize: number, sink: InstanceSink): number {
  const n = grid.size;
  const { cells } = grid;
  sink.clearInstances();

  let emitted = 0;
  let i = 0;
  for (let x = 0; x < n; x++) {
    const wx = gridToWorld(x, n, cellSize);
    for (let y = 0; y < n; y++) {
      const wy = gridToWorld(y, n, cellSize);
      for (let z = 0; z < n; z++, i++) {
        if (cells[i] !== ALIVE) continue;
        if (x === cursor.x && y === cursor.y && z === cursor.z) continue;
        sink.addInstance(wx, wy, gridToWorld(z, n, cellSize));
        emitted++;
      }
    }
  }
  return emitted;
}
