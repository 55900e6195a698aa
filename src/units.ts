import { AnsiColor } from './types';
import { colorize } from './format';

export enum TimeUnit {
  Microseconds = 0,
  Milliseconds = 1,
  Seconds = 2,
}

type Row = readonly [number, number, number];

/**
 * Conversion factors, indexed `[source][target]`.
 */
export const CONVERSION_TABLE: readonly [Row, Row, Row] = [
  [1, 0.001, 0.000001],
  [1000, 1, 0.001],
  [1_000_000, 1000, 1],
];

const SUFFIX: Readonly<Record<TimeUnit, string>> = {
  [TimeUnit.Microseconds]: 'us',
  [TimeUnit.Milliseconds]: 'ms',
  [TimeUnit.Seconds]: 's',
};

export function conversionFactor(source: TimeUnit, target: TimeUnit): number {
  return CONVERSION_TABLE[source][target];
}

export function convertUnit(value: number, source: TimeUnit, target: TimeUnit): number {
  if (source === target) return value;
  return value * CONVERSION_TABLE[source][target];
}

/**
 * Specialize a conversion once; the returned function is a single multiply
 * (or the identity when both units match).
 */
export function converter(source: TimeUnit, target: TimeUnit): (value: number) => number {
  if (source === target) return (value) => value;
  const factor = CONVERSION_TABLE[source][target];
  return (value) => value * factor;
}

/** Display suffix: 'us', 'ms' or 's'. */
export function unitSuffix(unit: TimeUnit): string {
  return SUFFIX[unit];
}

/** Yellow `[12.345 ms]` tag. */
export function formatElapsed(value: number, unit: TimeUnit): string {
  return colorize(AnsiColor.Yellow, `[${value.toFixed(3)} ${SUFFIX[unit]}]`);
}
