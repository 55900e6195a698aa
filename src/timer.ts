import { AnsiColor } from './types';
import type { Sink } from './types';
import { Logger } from './logger';
import { makeColoredTag } from './tag';
import { TimeUnit, convertUnit, formatElapsed } from './units';

/**
 * Millisecond clock. Default: `performance.now()`
 */
export type Clock = () => number;

export const defaultClock: Clock = () => performance.now();

export interface TimerOptions {
  /** Unit elapsed values are reported and returned in. Default: Milliseconds */
  unit?: TimeUnit;
  /** Default: the process-wide default sink */
  sink?: Sink;
  clock?: Clock;
}

export const TIMER_TAG = makeColoredTag(AnsiColor.Blue, '[TIMER]');

/* ------------------------------ Measure helpers ---------------------------- */

/** Milliseconds spent in one call of `fn`. Errors from `fn` propagate. */
export function measureMs(fn: () => void, clock: Clock = defaultClock): number {
  const start = clock();
  fn();
  return Math.max(0, clock() - start);
}

export async function measureMsAsync(fn: () => Promise<unknown>, clock: Clock = defaultClock): Promise<number> {
  const start = clock();
  await fn();
  return Math.max(0, clock() - start);
}

/* --------------------------------- Stopwatch ------------------------------- */

/**
 * Start/stop bookkeeping shared by `Timer` and `HierarchyTimer`.
 * Stopped → running on start, running → stopped on `stop()`; stopping a
 * stopped watch only warns.
 */
export abstract class Stopwatch {
  readonly description: string;
  readonly unit: TimeUnit;
  protected readonly clock: Clock;
  protected readonly logger: Logger;
  private startedAt = 0;
  private isRunning = false;

  protected constructor(description: string, options: TimerOptions) {
    this.description = description;
    this.unit = options.unit ?? TimeUnit.Milliseconds;
    this.clock = options.clock ?? defaultClock;
    this.logger = new Logger(TIMER_TAG, { sink: options.sink });
  }

  get running(): boolean {
    return this.isRunning;
  }

  /** Time since the last start, in `unit`; 0 while stopped */
  elapsed(): number {
    if (!this.isRunning) return 0;
    return convertUnit(Math.max(0, this.clock() - this.startedAt), TimeUnit.Milliseconds, this.unit);
  }

  /**
   * Stop and report. Returns the elapsed time in `unit`, or `undefined`
   * (with a warning) when the watch was not running.
   */
  stop(): number | undefined {
    if (!this.isRunning) {
      this.logger.warn('Trying to stop timer but timer is not running.');
      return undefined;
    }
    const elapsed = this.elapsed();
    this.isRunning = false;
    this.report(elapsed);
    return elapsed;
  }

  protected begin(): void {
    this.startedAt = this.clock();
    this.isRunning = true;
  }

  protected abstract report(elapsed: number): void;
}

/* ----------------------------------- Timer --------------------------------- */

export interface TimerStartOptions extends TimerOptions {
  /** Start on construction. Default: true */
  autoStart?: boolean;
}

/**
 * Wall-clock timer reporting `[TIMER] : [12.345 ms] : description` on stop.
 *
 * @example
 * const total = Timer.scope('load config', () => readConfig());
 */
export class Timer extends Stopwatch {
  constructor(description: string = '', options: TimerStartOptions = {}) {
    super(description, options);
    if (options.autoStart ?? true) this.begin();
  }

  start(): void {
    this.begin();
  }

  /** Restart from now, discarding the running measurement */
  reset(): void {
    this.begin();
  }

  protected report(elapsed: number): void {
    reportElapsed(this.logger, this.description, elapsed, this.unit);
  }

  /**
   * Run `fn` with a started timer; the timer is stopped and reported on
   * every way out of `fn` unless `fn` stopped it itself.
   */
  static scope<T>(description: string, fn: (timer: Timer) => T, options?: TimerOptions): T {
    const timer = new Timer(description, options);
    try {
      return fn(timer);
    } finally {
      if (timer.running) timer.stop();
    }
  }

  static async scopeAsync<T>(description: string, fn: (timer: Timer) => Promise<T>, options?: TimerOptions): Promise<T> {
    const timer = new Timer(description, options);
    try {
      return await fn(timer);
    } finally {
      if (timer.running) timer.stop();
    }
  }

  /** Time one call of `fn`, report it, and return the elapsed time in `options.unit`. */
  static measure(description: string, fn: () => void, options: TimerOptions = {}): number {
    const unit = options.unit ?? TimeUnit.Milliseconds;
    const elapsed = convertUnit(measureMs(fn, options.clock), TimeUnit.Milliseconds, unit);
    reportElapsed(new Logger(TIMER_TAG, { sink: options.sink }), description, elapsed, unit);
    return elapsed;
  }

  static async measureAsync(description: string, fn: () => Promise<unknown>, options: TimerOptions = {}): Promise<number> {
    const unit = options.unit ?? TimeUnit.Milliseconds;
    const elapsed = convertUnit(await measureMsAsync(fn, options.clock), TimeUnit.Milliseconds, unit);
    reportElapsed(new Logger(TIMER_TAG, { sink: options.sink }), description, elapsed, unit);
    return elapsed;
  }
}

function reportElapsed(logger: Logger, description: string, elapsed: number, unit: TimeUnit): void {
  logger.msg('{} : {}', formatElapsed(elapsed, unit), description);
}
