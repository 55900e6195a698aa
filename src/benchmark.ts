import { AnsiColor } from './types';
import { Logger } from './logger';
import { makeColoredTag } from './tag';
import { computeStats } from './stats';
import type { BenchmarkResult } from './stats';
import { measureMs, measureMsAsync } from './timer';
import type { TimerOptions } from './timer';
import { TimeUnit, converter, formatElapsed } from './units';

export const BENCHMARK_TAG = makeColoredTag(AnsiColor.Blue, '[TIMER][BENCHMARK]');

const MEAN_TAG = makeColoredTag(AnsiColor.Green, '[MEAN]');
const MEDIAN_TAG = makeColoredTag(AnsiColor.Green, '[MEDIAN]');
const MODE_TAG = makeColoredTag(AnsiColor.Green, '[MODE]');

export const DEFAULT_SAMPLES = 8;

const sampleCount = (n: number) => (Number.isFinite(n) ? Math.max(0, Math.floor(n)) : 0);

/**
 * Call `fn` `samples` times, then report mean, median and mode of the
 * per-call durations in `options.unit`.
 * Returns `undefined` (after a warning) when no sample was taken.
 */
export function benchmark(
  description: string,
  fn: () => void,
  samples: number = DEFAULT_SAMPLES,
  options: TimerOptions = {},
): BenchmarkResult | undefined {
  const unit = options.unit ?? TimeUnit.Milliseconds;
  const toUnit = converter(TimeUnit.Milliseconds, unit);
  const results: number[] = [];
  for (let i = sampleCount(samples); i > 0; i--) results.push(toUnit(measureMs(fn, options.clock)));
  return reportBenchmark(new Logger(BENCHMARK_TAG, { sink: options.sink }), description, results, unit);
}

/** Like `benchmark`, awaiting each call before starting the next. */
export async function benchmarkAsync(
  description: string,
  fn: () => Promise<unknown>,
  samples: number = DEFAULT_SAMPLES,
  options: TimerOptions = {},
): Promise<BenchmarkResult | undefined> {
  const unit = options.unit ?? TimeUnit.Milliseconds;
  const toUnit = converter(TimeUnit.Milliseconds, unit);
  const results: number[] = [];
  for (let i = sampleCount(samples); i > 0; i--) results.push(toUnit(await measureMsAsync(fn, options.clock)));
  return reportBenchmark(new Logger(BENCHMARK_TAG, { sink: options.sink }), description, results, unit);
}

/**
 * Compute statistics over `results` (already in `unit`) and emit them as one
 * multi-line report.
 */
export function reportBenchmark(
  logger: Logger,
  description: string,
  results: number[],
  unit: TimeUnit,
): BenchmarkResult | undefined {
  const stats = computeStats(results);
  if (!stats) {
    logger.warn('Trying to benchmark empty results');
    return undefined;
  }
  logger.msg(
    '{}\n\t{}   : {}\n\t{} : {}\n\t{}   : {}',
    description,
    MEAN_TAG, formatElapsed(stats.mean, unit),
    MEDIAN_TAG, formatElapsed(stats.median, unit),
    MODE_TAG, formatElapsed(stats.mode, unit),
  );
  return stats;
}
