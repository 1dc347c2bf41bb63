/**
 * Math Helper Utilities
 *
 * Numeric helpers for the drift statistics. Empty inputs yield a default
 * instead of NaN, except for quantiles.
 */

/**
 * Arithmetic mean, or defaultValue for an empty list
 */
export function mean(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Population standard deviation, or 0 for an empty list
 */
export function stddev(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }

  const avg = mean(values);
  let squares = 0;
  for (const value of values) {
    squares += (value - avg) ** 2;
  }
  return Math.sqrt(squares / values.length);
}

/**
 * Nearest-rank quantile of an ascending-sorted list.
 *
 * @param sorted - Values sorted ascending
 * @param q - Quantile in [0, 1]
 *
 * @example
 * ```typescript
 * quantileSorted([0, 1, 2, 3], 0.5)   // => 2
 * quantileSorted([0, 1, 2, 3], 1)     // => 3
 * ```
 */
export function quantileSorted(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) {
    return NaN;
  }

  const index = Math.min(sorted.length - 1, Math.max(0, Math.floor(q * sorted.length)));
  return sorted[index];
}

