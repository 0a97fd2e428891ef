/**
 * Clamp a value into [min, max].
 */
export function clamp(value: number, min = 0, max = 1): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Round a number to 3 decimal places.
 * Used for log output only; state keeps full precision.
 */
export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
