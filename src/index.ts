/**
 * ticklog: tag-based colorized console logging, timers and benchmarks
 * for Node runtimes
 */

export { Logger, TimedLogger, HierarchicalLogger, Emitter, createLogger, clockTime, depthTag } from './logger';
export type { DebugMessage, DebugFn, DepthDebugFn, TimedLoggerOptions } from './logger';
export { LineSink, StreamSink, ConsoleSink, MemorySink, NoOpSink, levelTag, streamFor } from './sinks';
export type { StreamSinkOptions, MemoryEntry } from './sinks';
export { makeDefaultTag, makeColoredTag, joinTags } from './tag';
export { FormatError, formatMessage, colorize, stripAnsi, shouldUseColor } from './format';
export type { Env } from './format';
export { resolveConfig, resolveDebug, debugSwitch, getDefaultSink, setDefaultSink } from './core';
export { TimeUnit, CONVERSION_TABLE, convertUnit, conversionFactor, converter, unitSuffix, formatElapsed } from './units';
export { Stopwatch, Timer, TIMER_TAG, defaultClock, measureMs, measureMsAsync } from './timer';
export type { Clock, TimerOptions, TimerStartOptions } from './timer';
export { HierarchyTimer, SUB_TASK_TAG } from './hierarchy';
export type { HierarchyTimerOptions } from './hierarchy';
export { benchmark, benchmarkAsync, reportBenchmark, BENCHMARK_TAG, DEFAULT_SAMPLES } from './benchmark';
export { computeStats, mean, median, mode } from './stats';
export type { BenchmarkResult } from './stats';
export { Tally } from './tally';
export { Level, AnsiColor } from './types';
export type {
  StreamName,
  Tag,
  TextStream,
  Sink,
  ColorMode,
  LoggerOptions,
  TicklogConfig,
} from './types';

// Default export
import { createLogger } from './logger';
import { Level } from './types';

export default {
  createLogger,
  Level,
};
