export interface BenchmarkResult {
  mean: number;
  median: number;
  mode: number;
  /** Sample count */
  samples: number;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Middle element of an ascending array; the average of the two middle
 * elements for an even count. `NaN` for an empty array.
 */
export function median(sorted: readonly number[]): number {
  if (sorted.length === 0) return NaN;
  const mid = sorted.length >> 1;
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Value of the longest run of equal neighbours in an ascending array.
 * Ties go to the first run that reached the maximum length, so an
 * all-distinct array yields its smallest value. `NaN` for an empty array.
 */
export function mode(sorted: readonly number[]): number {
  if (sorted.length === 0) return NaN;
  let best = sorted[0];
  let bestCount = 1;
  let count = 1;
  for (let i = 1; i < sorted.length; i++) {
    count = sorted[i] === sorted[i - 1] ? count + 1 : 1;
    if (count > bestCount) {
      bestCount = count;
      best = sorted[i];
    }
  }
  return best;
}

/**
 * Sort `samples` ascending in place and compute mean, median and mode.
 * Returns `undefined` for an empty set.
 */
export function computeStats(samples: number[]): BenchmarkResult | undefined {
  if (samples.length === 0) return undefined;
  samples.sort((a, b) => a - b);
  return {
    mean: mean(samples),
    median: median(samples),
    mode: mode(samples),
    samples: samples.length,
  };
}
