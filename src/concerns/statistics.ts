/**
 * Numeric helpers for latency aggregation. Every function returns 0 for an
 * empty input instead of NaN.
 */

/** Rounds to `decimals` places, halves going up. */
export function roundHalfUp(value: number, decimals: number = 2): number {
  if (value === 0 || !Number.isFinite(value)) {
    return 0;
  }
  const factor = 10 ** decimals;
  return Math.floor(value * factor + 0.5) / factor;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return sum(values) / values.length;
}

/** Middle value; the average of the two middle values for an even count. */
export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;

  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);

  if (sorted.length % 2 === 0) {
    return ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2;
  }
  return sorted[mid] ?? 0;
}

/**
 * Mean absolute deviation from `center` (the mean when omitted). Used as the
 * jitter measure, so it is not a standard deviation.
 */
export function meanAbsoluteDeviation(values: readonly number[], center: number = mean(values)): number {
  if (values.length === 0) return 0;

  let totalDeviation = 0;
  for (const value of values) {
    totalDeviation += Math.abs(value - center);
  }
  return totalDeviation / values.length;
}

export function minOf(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((min, value) => (value < min ? value : min), Infinity);
}

export function maxOf(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((max, value) => (value > max ? value : max), -Infinity);
}
