import { AnsiColor } from './types';
import { HierarchicalLogger } from './logger';
import { makeColoredTag } from './tag';
import { Stopwatch, TIMER_TAG, measureMs } from './timer';
import type { TimerOptions } from './timer';
import { TimeUnit, convertUnit, formatElapsed } from './units';

export interface HierarchyTimerOptions extends TimerOptions {
  /** Indentation of this timer's own lines. Default: 0 */
  depth?: number;
}

export const SUB_TASK_TAG = makeColoredTag(AnsiColor.Blue, '[TIMER][SUB]');

/**
 * Timer that brackets named sub-tasks:
 *
 * ```
 * [TIMER] : build {
 * 	[TIMER][SUB] : [2.000 ms] : parse
 * 	[TIMER][SUB] : [3.000 ms] : emit
 * [TIMER] : } [9.000 ms] : build (sub-tasks [5.000 ms])
 * ```
 *
 * Always started on construction; it has no manual start or reset. The total
 * is the timer's own wall-clock time, so un-instrumented work between
 * sub-tasks counts too.
 */
export class HierarchyTimer extends Stopwatch {
  readonly depth: number;
  private readonly tree: HierarchicalLogger;
  private readonly sub: HierarchicalLogger;
  private subTotal = 0;
  private nesting = 0;

  constructor(description: string = '', options: HierarchyTimerOptions = {}) {
    super(description, options);
    const depth = Math.floor(options.depth ?? 0);
    this.depth = Number.isFinite(depth) ? Math.max(0, depth) : 0;
    this.tree = new HierarchicalLogger(TIMER_TAG, { sink: options.sink });
    this.sub = new HierarchicalLogger(SUB_TASK_TAG, { sink: options.sink });
    this.tree.msg(this.depth, '{} {{', description);
    this.begin();
  }

  /** Sum of outermost sub-task times, in `unit` */
  get subTaskTotal(): number {
    return this.subTotal;
  }

  /**
   * Measure one sub-task and report it one level deeper than its caller.
   * Sub-tasks started from inside `fn` nest further; only outermost ones
   * count towards `subTaskTotal`. Returns the elapsed time in `displayUnit`.
   */
  subTask(description: string, fn: () => void, displayUnit: TimeUnit = this.unit): number {
    const outermost = this.nesting === 0;
    const depth = this.depth + 1 + this.nesting;
    let ms: number;
    this.nesting++;
    try {
      ms = measureMs(fn, this.clock);
    } finally {
      this.nesting--;
    }
    if (outermost) this.subTotal += convertUnit(ms, TimeUnit.Milliseconds, this.unit);
    const shown = convertUnit(ms, TimeUnit.Milliseconds, displayUnit);
    this.sub.msg(depth, '{} : {}', formatElapsed(shown, displayUnit), description);
    return shown;
  }

  protected report(elapsed: number): void {
    this.tree.msg(
      this.depth,
      '}} {} : {} (sub-tasks {})',
      formatElapsed(elapsed, this.unit),
      this.description,
      formatElapsed(this.subTotal, this.unit),
    );
  }

  /** Run `fn` with a fresh hierarchy timer, stopping it on the way out. */
  static scope<T>(description: string, fn: (timer: HierarchyTimer) => T, options?: HierarchyTimerOptions): T {
    const timer = new HierarchyTimer(description, options);
    try {
      return fn(timer);
    } finally {
      if (timer.running) timer.stop();
    }
  }
}
