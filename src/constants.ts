// ── Arena ──

/** Default number of cells along each axis of the arena. */
export const ARENA_SIZE = 32;

/** Smallest grid the reflect-at-edge neighbourhood is defined for. */
export const MIN_GRID_SIZE = 2;

/** Smallest arena accepted from the URL. */
export const MIN_ARENA_SIZE = 4;

/** Largest arena the instance list is sized for (128³ ≈ 2M cells). */
export const MAX_ARENA_SIZE = 128;

/** Edge length of one cell in world units. */
export const CELL_SIZE = 1;

// ── Simulation pacing ──

/** Progress needed to fire one generation: a quarter second at speed 1. */
export const MAX_TICK_PROGRESS = 0.25;

/** Slowest speed multiplier. */
export const MIN_SPEED = 1;

/** Fastest speed multiplier. */
export const MAX_SPEED = 5;

/** Speed multiplier at start-up. */
export const DEFAULT_SPEED = 1;

// ── Seeding ──

/** Fraction of cells alive in the random soup region. */
export const RANDOM_SOUP_DENSITY = 0.2;

/** Seed used for the random soup when none is given in the URL. */
export const DEFAULT_RANDOM_SEED = 1;

// ── Rendering ──

/** Scene background color (near black). */
export const SCENE_BG_COLOR = 0x0b0b14;

/** Color of the highlighted cursor cube. */
export const CURSOR_COLOR = 0xffdd33;

/** Color of the arena bounding box edges. */
export const BOUNDS_COLOR = 0x44485a;

/** Color of dead cells in the slice view. */
export const SLICE_DEAD_COLOR = 0x1a1a26;

/** Rendered cube edge as a fraction of CELL_SIZE, leaving a gap between neighbours. */
export const CUBE_FILL = 0.85;

/** Minimum camera distance, in arena widths. */
export const CAMERA_MIN_DISTANCE = 0.6;

/** Maximum camera distance, in arena widths. */
export const CAMERA_MAX_DISTANCE = 4.0;

/** Initial camera distance, in arena widths. */
export const CAMERA_INITIAL_DISTANCE = 1.8;

/** Target rendering frame rate, used for rAF frame-rate capping. */
export const TARGET_FPS = 60;

/** Minimum interval between status pushes to the controls bar, in ms. */
export const STATUS_INTERVAL_MS = 100;
