/**
 * Log levels. `Message` carries no level tag.
 */
export enum Level {
  Message = 0,
  Info = 1,
  Debug = 2,
  Warn = 3,
  Error = 4,
}

/**
 * ANSI foreground color codes
 */
export enum AnsiColor {
  Black = 30,
  Red = 31,
  Green = 32,
  Yellow = 33,
  Blue = 34,
  Magenta = 35,
  Cyan = 36,
  White = 37,
  Reset = 39,
  LightBlack = 90,
  LightRed = 91,
  LightGreen = 92,
  LightYellow = 93,
  LightBlue = 94,
  LightMagenta = 95,
  LightCyan = 96,
  LightWhite = 97,
}

/**
 * Destination of a line: ordinary output or diagnostic output
 */
export type StreamName = 'out' | 'err';

/**
 * A short, optionally colorized label
 */
export type Tag = string;

/**
 * Anything with a string `write` (process.stdout, a PassThrough, a test double)
 */
export interface TextStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

/**
 * Sink interface for pluggable output destinations.
 * A single `write` produces exactly one line and never throws.
 */
export interface Sink {
  write(level: Level, context: string, message: string): void;
}

export type ColorMode = 'auto' | 'on' | 'off';

/**
 * Logger configuration
 */
export interface LoggerOptions {
  /**
   * Output destination. Default: the process-wide default sink
   */
  sink?: Sink;
  /**
   * Enable `dbg()`. Default: resolved from the build flag and environment
   */
  debug?: boolean;
  /**
   * Delimiter placed between tags of a tag list
   */
  delimiter?: string;
}

/**
 * Resolved runtime configuration
 */
export interface TicklogConfig {
  debug: boolean;
  color: ColorMode;
}
