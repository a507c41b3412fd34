/**
 * Small statistics helpers used by the classifiers.
 */

/**
 * Quantile of an ascending-sorted array using linear interpolation
 * between the two closest ranks.
 */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) {
    throw new Error('quantile of empty array');
  }
  const pos = q * (sorted.length - 1);
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export function quantiles(sorted: readonly number[], qs: readonly number[]): number[] {
  return qs.map((q) => quantile(sorted, q));
}

/**
 * Sturges' rule bin count, clamped to [min, max].
 */
export function sturgesBinCount(n: number, min = 4, max = 7): number {
  const bins = Math.ceil(Math.log2(n + 1));
  return Math.min(Math.max(min, bins), max);
}

/**
 * Bump any edge that is not above its predecessor to `previous + 1`.
 * Returns a new array.
 */
export function forceIncreasing(edges: readonly number[]): number[] {
  const result = [...edges];
  for (let i = 1; i < result.length; i++) {
    if (result[i] <= result[i - 1]) {
      result[i] = result[i - 1] + 1;
    }
  }
  return result;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Sample standard deviation (n - 1 denominator).
 */
export function standardDeviation(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  let sq = 0;
  for (const v of values) sq += (v - m) * (v - m);
  return Math.sqrt(sq / (values.length - 1));
}

export function sortedNumbers(values: Iterable<number | null | undefined>): number[] {
  const result: number[] = [];
  for (const v of values) {
    if (v !== null && v !== undefined && !Number.isNaN(v)) result.push(v);
  }
  return result.sort((a, b) => a - b);
}
