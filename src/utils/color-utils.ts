/** Color stops for the height scale: violet → blue → teal → lime. */
const HEIGHT_STOPS: [number, number, number, number][] = [
  [0.000, 110,  40, 200],  // violet
  [0.333,  40, 110, 255],  // blue
  [0.667,   0, 200, 170],  // teal
  [1.000, 180, 255,  60],  // lime
];

/**
 * Maps a fraction in [0, 1] (bottom to top of the arena) to a 0xRRGGBB
 * color. Values outside the range are clamped.
 */
export function heightToColor(frac: number): number {
  const f = Math.max(0, Math.min(1, frac));
  // Find the two surrounding stops
  let lo = HEIGHT_STOPS[0];
  let hi = HEIGHT_STOPS[HEIGHT_STOPS.length - 1];
  for (let i = 1; i < HEIGHT_STOPS.length; i++) {
    if (f <= HEIGHT_STOPS[i][0]) {
      lo = HEIGHT_STOPS[i - 1];
      hi = HEIGHT_STOPS[i];
      break;
    }
  }
  const span = hi[0] - lo[0];
  const s = span > 0 ? (f - lo[0]) / span : 0;
  const r = Math.round(lo[1] + s * (hi[1] - lo[1]));
  const g = Math.round(lo[2] + s * (hi[2] - lo[2]));
  const b = Math.round(lo[3] + s * (hi[3] - lo[3]));
  return r * 65536 + g * 256 + b;
}

/** Height fraction of row `y` in an arena of `size` rows. */
export function heightFraction(y: number, size: number): number {
  return size > 1 ? y / (size - 1) : 0;
}

/** Convert a 0xRRGGBB integer to [r, g, b] in 0..255. */
export function intToRGB(c: number): [number, number, number] {
  // eslint-disable-next-line no-bitwise
  return [(c >> 16) & 0xff, (c >> 8) & 0xff, c & 0xff];
}
