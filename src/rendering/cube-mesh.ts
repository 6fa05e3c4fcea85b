import type { Axis } from "../types/grid-types";

/** Plain vertex data for an indexed triangle mesh. */
export interface MeshData {
  positions: number[];
  normals: number[];
  indices: number[];
}

const AXIS_INDEX: Record<Axis, number> = { x: 0, y: 1, z: 2 };

/** Face corners in (u, v) units, counter-clockwise seen from outside. */
const CORNERS: [number, number][] = [[-1, -1], [1, -1], [1, 1], [-1, 1]];

export function emptyMesh(): MeshData {
  return { positions: [], normals: [], indices: [] };
}

/**
 * Append one square face of an axis-aligned cube centred on the origin.
 *
 * The face lies at ±size/2 on `axis`. Tangents are chosen so that u × v
 * points along the outward normal, which keeps the winding front-facing.
 */
export function appendCubeFace(mesh: MeshData, size: number, axis: Axis, positive: boolean): void {
  const half = size / 2;
  const n = AXIS_INDEX[axis];
  const next = (n + 1) % 3;
  const nextNext = (n + 2) % 3;
  const [u, v] = positive ? [next, nextNext] : [nextNext, next];
  const sign = positive ? 1 : -1;

  // Index of the first vertex this face adds
  const base = mesh.positions.length / 3;

  for (const [cu, cv] of CORNERS) {
    const p = [0, 0, 0];
    p[n] = sign * half;
    p[u] = cu * half;
    p[v] = cv * half;
    mesh.positions.push(p[0], p[1], p[2]);

    const normal = [0, 0, 0];
    normal[n] = sign;
    mesh.normals.push(normal[0], normal[1], normal[2]);
  }

  mesh.indices.push(base, base + 1, base + 2, base, base + 2, base + 3);
}

/** A closed cube of edge `size`: 24 vertices, 12 triangles. */
export function buildCubeMesh(size: number): MeshData {
  const mesh = emptyMesh();
  for (const axis of ["x", "y", "z"] as const) {
    appendCubeFace(mesh, size, axis, true);
    appendCubeFace(mesh, size, axis, false);
  }
  return mesh;
}
