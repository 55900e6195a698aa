import { describe, expect, it } from 'vitest';
import {
  CONVERSION_TABLE,
  TimeUnit,
  conversionFactor,
  convertUnit,
  converter,
  formatElapsed,
  unitSuffix,
} from './units';

const UNITS = [TimeUnit.Microseconds, TimeUnit.Milliseconds, TimeUnit.Seconds];

describe('time unit conversion', () => {
  it('has an identity diagonal', () => {
    for (const u of UNITS) expect(CONVERSION_TABLE[u][u]).toBe(1);
  });

  it('converts between units', () => {
    expect(convertUnit(1500, TimeUnit.Milliseconds, TimeUnit.Seconds)).toBe(1.5);
    expect(convertUnit(2, TimeUnit.Seconds, TimeUnit.Microseconds)).toBe(2_000_000);
    expect(convertUnit(1, TimeUnit.Microseconds, TimeUnit.Milliseconds)).toBe(0.001);
    expect(conversionFactor(TimeUnit.Seconds, TimeUnit.Milliseconds)).toBe(1000);
  });

  it('round-trips every pair of units', () => {
    const x = 123.456;
    for (const a of UNITS) {
      for (const b of UNITS) {
        expect(convertUnit(convertUnit(x, a, b), b, a)).toBeCloseTo(x, 6);
      }
    }
  });

  it('specializes a converter', () => {
    expect(converter(TimeUnit.Milliseconds, TimeUnit.Milliseconds)(7)).toBe(7);
    expect(converter(TimeUnit.Seconds, TimeUnit.Milliseconds)(1.5)).toBe(1500);
  });
});

describe('elapsed display', () => {
  it('uses short suffixes', () => {
    expect(UNITS.map(unitSuffix)).toEqual(['us', 'ms', 's']);
  });

  it('renders a yellow three-decimal tag', () => {
    expect(formatElapsed(1.5, TimeUnit.Milliseconds)).toBe('\x1b[33m[1.500 ms]\x1b[0m');
    expect(formatElapsed(0, TimeUnit.Seconds)).toBe('\x1b[33m[0.000 s]\x1b[0m');
  });
});
