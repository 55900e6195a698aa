import { AnsiColor, Level } from './types';
import type { LoggerOptions, Sink, Tag } from './types';
import { formatMessage } from './format';
import { joinTags, makeColoredTag } from './tag';
import { debugSwitch, getDefaultSink } from './core';

/**
 * A debug message is either a template or a producer that is only called
 * when debug output is enabled.
 */
export type DebugMessage = string | (() => string);

export type DebugFn = (template: DebugMessage, ...args: unknown[]) => void;
export type DepthDebugFn = (depth: number, template: DebugMessage, ...args: unknown[]) => void;

// Shared stubs installed in place of dbg() when debug output is off
const noop: DebugFn = () => {};
const depthNoop: DepthDebugFn = () => {};

function describeFailure(cause: unknown): string {
  try {
    return cause instanceof Error ? cause.message : String(cause);
  } catch {
    return 'unrenderable error';
  }
}

/**
 * Common construction and formatting for every logger flavor
 */
export abstract class Emitter {
  /** Joined tag string prefixed to every line */
  readonly context: string;
  readonly debugEnabled: boolean;
  protected readonly sink: Sink;

  protected constructor(tags: Tag | readonly Tag[], options: LoggerOptions = {}) {
    this.context = typeof tags === 'string' ? tags : joinTags(tags, options.delimiter);
    this.sink = options.sink ?? getDefaultSink();
    this.debugEnabled = debugSwitch(options.debug);
  }

  /**
   * Format and hand the line to the sink.
   * A template, producer or argument that fails to render is reported at
   * Error level in place of the message.
   */
  protected emit(level: Level, prefix: string, template: DebugMessage, args: readonly unknown[]): void {
    let message: string;
    try {
      message = formatMessage(typeof template === 'function' ? template() : template, args);
    } catch (e) {
      this.sink.write(Level.Error, prefix, `format error: ${describeFailure(e)}`);
      return;
    }
    this.sink.write(level, prefix, message);
  }
}

/**
 * Tag-context logger.
 *
 * @example
 * const log = new Logger([makeColoredTag(AnsiColor.Blue, '[NET]'), '[rx]']);
 * log.info('{} bytes from {}', 512, 'peer-1');
 * // [NET][rx][INFO] : 512 bytes from peer-1
 */
export class Logger extends Emitter {
  /** Debug-level line; a shared no-op when debug output is off */
  readonly dbg: DebugFn;

  constructor(tags: Tag | readonly Tag[], options?: LoggerOptions) {
    super(tags, options);
    this.dbg = this.debugEnabled ? (template, ...args) => this.log(Level.Debug, template, args) : noop;
  }

  /** Plain line without a level tag */
  msg(template: string, ...args: unknown[]): void {
    this.log(Level.Message, template, args);
  }

  info(template: string, ...args: unknown[]): void {
    this.log(Level.Info, template, args);
  }

  warn(template: string, ...args: unknown[]): void {
    this.log(Level.Warn, template, args);
  }

  err(template: string, ...args: unknown[]): void {
    this.log(Level.Error, template, args);
  }

  /**
   * Text placed before the level tag
   */
  protected prefix(): string {
    return this.context;
  }

  private log(level: Level, template: DebugMessage, args: readonly unknown[]): void {
    this.emit(level, this.prefix(), template, args);
  }
}

/* ------------------------------ Timed logger ------------------------------- */

export interface TimedLoggerOptions extends LoggerOptions {
  /** Default: White */
  timestampColor?: AnsiColor;
  /** Milliseconds a rendered timestamp is reused. Default: 1000 */
  refreshInterval?: number;
  /** Clock source (epoch ms) for testing. Default: () => Date.now() */
  now?: () => number;
}

const pad2 = (n: number) => (n < 10 ? `0${n}` : `${n}`);

/** Local wall-clock time as HH:MM:SS. */
export function clockTime(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/**
 * Logger that prepends a colored `[HH:MM:SS]` tag.
 * The tag is rendered at most once per refresh interval.
 */
export class TimedLogger extends Logger {
  private timestampColor: AnsiColor;
  private readonly refreshInterval: number;
  private readonly now: () => number;
  private cached = '';
  private lastRefresh = 0;

  constructor(tags: Tag | readonly Tag[], options: TimedLoggerOptions = {}) {
    super(tags, options);
    this.timestampColor = options.timestampColor ?? AnsiColor.White;
    this.refreshInterval = options.refreshInterval ?? 1000;
    this.now = options.now ?? (() => Date.now());
  }

  /** Current (possibly cached) timestamp tag */
  timestampTag(): string {
    const now = this.now();
    if (!this.cached || now - this.lastRefresh > this.refreshInterval) {
      this.cached = makeColoredTag(this.timestampColor, `[${clockTime(new Date(now))}]`);
      this.lastRefresh = now;
    }
    return this.cached;
  }

  /** Force the next line to render a fresh timestamp */
  refreshTimestamp(): void {
    this.cached = '';
  }

  setTimestampColor(color: AnsiColor): void {
    this.timestampColor = color;
    this.cached = '';
  }

  protected prefix(): string {
    return this.timestampTag() + this.context;
  }
}

/* --------------------------- Hierarchical logger --------------------------- */

/** One tab per nesting level; non-positive and non-finite depths yield nothing. */
export function depthTag(depth: number): string {
  const n = Math.floor(depth);
  return Number.isFinite(n) && n > 0 ? '\t'.repeat(n) : '';
}

/**
 * Logger whose lines are indented by a caller-supplied depth.
 * Holds no depth state of its own.
 */
export class HierarchicalLogger extends Emitter {
  readonly dbg: DepthDebugFn;

  constructor(tags: Tag | readonly Tag[], options?: LoggerOptions) {
    super(tags, options);
    this.dbg = this.debugEnabled ? (depth, template, ...args) => this.log(Level.Debug, depth, template, args) : depthNoop;
  }

  msg(depth: number, template: string, ...args: unknown[]): void {
    this.log(Level.Message, depth, template, args);
  }

  info(depth: number, template: string, ...args: unknown[]): void {
    this.log(Level.Info, depth, template, args);
  }

  warn(depth: number, template: string, ...args: unknown[]): void {
    this.log(Level.Warn, depth, template, args);
  }

  err(depth: number, template: string, ...args: unknown[]): void {
    this.log(Level.Error, depth, template, args);
  }

  private log(level: Level, depth: number, template: DebugMessage, args: readonly unknown[]): void {
    this.emit(level, depthTag(depth) + this.context, template, args);
  }
}

/**
 * Create a new logger instance
 */
export function createLogger(tags: Tag | readonly Tag[], options?: LoggerOptions): Logger {
  return new Logger(tags, options);
}
