import { ARENA_SIZE, DEFAULT_RANDOM_SEED, MAX_ARENA_SIZE, MIN_ARENA_SIZE } from "../constants";
import { isSeedPreset, SeedPreset } from "../simulation/seed-presets";

export interface SimConfig {
  arenaSize: number;
  preset: SeedPreset;
  randomSeed: number;
}

function parseInteger(value: string): number | null {
  if (value.trim() === "") return null;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : null;
}

export const DEFAULT_CONFIG: SimConfig = {
  arenaSize: ARENA_SIZE,
  preset: "random-soup",
  randomSeed: DEFAULT_RANDOM_SEED,
};

/**
 * Reads start-up settings from a query string such as
 * `?size=48&preset=cross&seed=7`. Unusable values fall back to defaults.
 */
export function readSimConfig(search: string): SimConfig {
  const params = new URLSearchParams(search);
  const config = { ...DEFAULT_CONFIG };

  const size = params.get("size");
  if (size !== null) {
    const parsed = parseInteger(size);
    if (parsed !== null) {
      config.arenaSize = Math.max(MIN_ARENA_SIZE, Math.min(MAX_ARENA_SIZE, parsed));
    } else {
      console.warn(`Ignoring invalid size "${size}"`);
    }
  }

  const preset = params.get("preset");
  if (preset !== null) {
    if (isSeedPreset(preset)) {
      config.preset = preset;
    } else {
      console.warn(`Ignoring unknown preset "${preset}"`);
    }
  }

  const seed = params.get("seed");
  if (seed !== null) {
    const parsed = parseInteger(seed);
    if (parsed !== null) {
      config.randomSeed = parsed;
    } else {
      console.warn(`Ignoring invalid seed "${seed}"`);
    }
  }

  return config;
}
