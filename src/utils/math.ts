/**
 * @fileoverview Math utilities shared by the scoring modules.
 */

/**
 * Clamp a value to [0, 1].
 * Non-finite input (NaN) collapses to 0 so it can never leak into a blend.
 */
export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

/**
 * Arithmetic mean; 0 for an empty list.
 */
export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

export function approxEqual(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance;
}
