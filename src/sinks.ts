import { AnsiColor, Level } from './types';
import type { ColorMode, Sink, StreamName, TextStream } from './types';
import { colorize, processEnv, shouldUseColor, stripAnsi } from './format';
import type { Env } from './format';

const LEVEL_LABEL: Readonly<Record<Level, string>> = {
  [Level.Message]: '',
  [Level.Info]: '[INFO]',
  [Level.Debug]: '[DEBUG]',
  [Level.Warn]: '[WARN]',
  [Level.Error]: '[ERROR]',
};

const LEVEL_COLOR: Readonly<Record<Level, AnsiColor>> = {
  [Level.Message]: AnsiColor.White,
  [Level.Info]: AnsiColor.Green,
  [Level.Debug]: AnsiColor.Cyan,
  [Level.Warn]: AnsiColor.Yellow,
  [Level.Error]: AnsiColor.Red,
};

/**
 * Colored level label; empty for `Level.Message`
 */
export function levelTag(level: Level): string {
  return level === Level.Message ? '' : colorize(LEVEL_COLOR[level], LEVEL_LABEL[level]);
}

/**
 * Message/Info/Debug go to ordinary output, Warn/Error to diagnostic output
 */
export function streamFor(level: Level): StreamName {
  return level === Level.Warn || level === Level.Error ? 'err' : 'out';
}

/**
 * Base of every line-producing sink: the single point where a line is
 * composed and handed to its destination.
 *
 * A line is `context + levelTag + " : " + message + "\n"` (Message level: no
 * level tag, and no separator when the context is empty). It is built in a
 * buffer owned by the sink and reused across calls, then emitted with one
 * write. A write issued while another is in progress on the same sink (a
 * destination that logs from inside its own write) gets a buffer of its own.
 */
export abstract class LineSink implements Sink {
  private readonly parts: string[] = [];
  private locked = false;

  /** Lines that could be neither written nor reported */
  public dropped = 0;

  protected constructor(protected readonly colors: boolean) {}

  write(level: Level, context: string, message: string): void {
    const reentrant = this.locked;
    const parts = reentrant ? [] : this.parts;
    this.locked = true;
    try {
      parts.push(context);
      if (level !== Level.Message) parts.push(levelTag(level));
      if (level !== Level.Message || context) parts.push(' : ');
      parts.push(message, '\n');
      const line = parts.join('');
      this.emit(streamFor(level), this.colors ? line : stripAnsi(line), level);
    } catch (e) {
      this.recover(e);
    } finally {
      parts.length = 0;
      this.locked = reentrant;
    }
  }

  /**
   * Deliver one complete line
   */
  protected abstract emit(stream: StreamName, line: string, level: Level): void;

  private recover(cause: unknown): void {
    try {
      const reason = cause instanceof Error ? cause.message : String(cause);
      this.emit('err', `[sink] write failed: ${reason}\n`, Level.Error);
    } catch {
      this.dropped++;
    }
  }
}

export interface StreamSinkOptions {
  out: TextStream;
  /** Diagnostic stream. Default: `out` */
  err?: TextStream;
  /** Default: 'auto' (decided by `out`'s TTY flag and the environment) */
  color?: ColorMode;
  env?: Env;
}

/**
 * Sink over a pair of writable text streams
 */
export class StreamSink extends LineSink {
  private readonly out: TextStream;
  private readonly err: TextStream;

  constructor(options: StreamSinkOptions) {
    super(shouldUseColor(options.color ?? 'auto', options.out.isTTY === true, options.env ?? processEnv()));
    this.out = options.out;
    this.err = options.err ?? options.out;
  }

  protected emit(stream: StreamName, line: string): void {
    (stream === 'out' ? this.out : this.err).write(line);
  }
}

/**
 * Sink over process.stdout / process.stderr
 */
export class ConsoleSink extends StreamSink {
  constructor(color: ColorMode = 'auto', env?: Env) {
    super({ out: process.stdout, err: process.stderr, color, env });
  }
}

export interface MemoryEntry {
  level: Level;
  stream: StreamName;
  line: string;
}

/**
 * Memory sink for testing or buffering lines. Colors are kept only for 'on'.
 */
export class MemorySink extends LineSink {
  public entries: MemoryEntry[] = [];

  constructor(color: ColorMode = 'off') {
    super(color === 'on');
  }

  protected emit(stream: StreamName, line: string, level: Level): void {
    this.entries.push({ level, stream, line });
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Lines written so far, optionally for one stream only
   */
  getLines(stream?: StreamName): string[] {
    return this.entries.filter((e) => !stream || e.stream === stream).map((e) => e.line);
  }

  text(stream?: StreamName): string {
    return this.getLines(stream).join('');
  }
}

/**
 * No-op sink that discards all lines
 */
export class NoOpSink implements Sink {
  write(_level: Level, _context: string, _message: string): void {
    // Intentionally empty
  }
}
