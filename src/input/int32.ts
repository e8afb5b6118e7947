export const I32_MIN = -2147483648;
export const I32_MAX = 2147483647;

export function clampI32(v: number, min: number, max: number): number {
  if (v < min) return min;
  if (v > max) return max;
  return v;
}

/**
 * Add two i32 values with saturation instead of wrapping.
 *
 * Motion totals are kept as i32 so a long burst of large deltas pins at the edge rather than
 * flipping sign.
 */
export function addI32Saturating(a: number, b: number): number {
  return clampI32(a + b, I32_MIN, I32_MAX);
}
