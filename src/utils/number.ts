/**
 * Numeric helpers shared across the relay.
 */

/**
 * Clamp a number between a minimum and maximum bound.
 * Returns `min` if the value is NaN.
 *
 * @param value - Number to clamp
 * @param min   - Lower bound (inclusive)
 * @param max   - Upper bound (inclusive)
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min
  return Math.min(max, Math.max(min, value))
}
