/**
 * Numeric helpers for observations
 */

/**
 * Round on the decimal expansion of the stored double, so 2.675 (held as
 * 2.67499999…) gives 2.67 rather than the 2.68 that scaling by 10^d produces.
 */
export function roundTo(value: number, decimals: number): number {
  return Number(value.toFixed(decimals));
}

export function isPositiveFinite(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/**
 * Uniform draw from the closed interval [min, max].
 * Out-of-range output from a custom random source is clamped.
 */
export function uniform(min: number, max: number, random: () => number): number {
  const value = min + (max - min) * random();
  if (!Number.isFinite(value)) return min;
  return Math.min(max, Math.max(min, value));
}
