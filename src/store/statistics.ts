/**
 * Summary statistics over run durations and other per-run values.
 */

/**
 * Percentile by linear interpolation between the closest ranks.
 * `sorted` must be in ascending order; returns null when empty.
 */
export function percentile(sorted: readonly number[], p: number): number | null {
  const n = sorted.length;
  if (n === 0) return null;

  const k = ((n - 1) * p) / 100;
  const f = Math.floor(k);
  const c = Math.min(f + 1, n - 1);
  const lower = sorted[f];
  const upper = sorted[c];
  if (lower === undefined || upper === undefined) return null;

  return lower + (upper - lower) * (k - f);
}

export function median(sorted: readonly number[]): number | null {
  return percentile(sorted, 50);
}

/**
 * Arithmetic mean; null when there are no values.
 */
export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export function sortAscending(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}
