import { RANDOM_SOUP_DENSITY } from "../constants";
import { cellIndex } from "../utils/grid-utils";

export type SeedPreset = "empty" | "random-soup" | "centre-block" | "cross";

export const SEED_PRESETS: readonly SeedPreset[] = ["empty", "random-soup", "centre-block", "cross"];

export function isSeedPreset(value: string): value is SeedPreset {
  return SEED_PRESETS.some((preset) => preset === value);
}

/** Small deterministic PRNG returning floats in [0, 1). */
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    /* eslint-disable no-bitwise */
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    /* eslint-enable no-bitwise */
  };
}

/**
 * Creates the initial cell mask for a preset.
 * Returns a Uint8Array of size³ laid out like Grid.cells (0 = dead, 1 = alive).
 */
export function createSeedMask(preset: SeedPreset, size: number, random: () => number = Math.random): Uint8Array {
  const mask = new Uint8Array(size * size * size);

  switch (preset) {
    case "empty":
      break;

    case "random-soup":
      fillRandomSoup(mask, size, random);
      break;

    case "centre-block":
      fillCentreBlock(mask, size);
      break;

    case "cross":
      fillCross(mask, size);
      break;
  }

  return mask;
}

/** Central half-cube filled at RANDOM_SOUP_DENSITY. */
function fillRandomSoup(mask: Uint8Array, size: number, random: () => number): void {
  const lo = Math.floor(size / 4);
  const hi = size - lo;
  for (let x = lo; x < hi; x++) {
    for (let y = lo; y < hi; y++) {
      for (let z = lo; z < hi; z++) {
        if (random() < RANDOM_SOUP_DENSITY) mask[cellIndex(x, y, z, size)] = 1;
      }
    }
  }
}

/** A solid 2×2×2 block (clipped for tiny arenas) at the centre. */
function fillCentreBlock(mask: Uint8Array, size: number): void {
  const lo = Math.max(0, Math.floor(size / 2) - 1);
  const hi = Math.min(size, lo + 2);
  for (let x = lo; x < hi; x++) {
    for (let y = lo; y < hi; y++) {
      for (let z = lo; z < hi; z++) {
        mask[cellIndex(x, y, z, size)] = 1;
      }
    }
  }
}

/** A plus sign of five cells in the centre z-layer plus one cell above and below. */
function fillCross(mask: Uint8Array, size: number): void {
  const c = Math.floor(size / 2);
  const points: [number, number, number][] = [
    [c, c, c],
    [c - 1, c, c], [c + 1, c, c],
    [c, c - 1, c], [c, c + 1, c],
    [c, c, c - 1], [c, c, c + 1],
  ];
  for (const [x, y, z] of points) {
    if (x < 0 || y < 0 || z < 0 || x >= size || y >= size || z >= size) continue;
    mask[cellIndex(x, y, z, size)] = 1;
  }
}
