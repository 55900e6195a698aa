import { afterEach, describe, expect, it } from 'vitest';
import { debugSwitch, getDefaultSink, resolveConfig, resolveDebug, setDefaultSink } from './core';
import { Logger } from './logger';
import { ConsoleSink, MemorySink } from './sinks';

describe('resolveDebug', () => {
  it.each([
    [{}, true],
    [{ NODE_ENV: 'production' }, false],
    [{ NODE_ENV: 'production', DEBUG_MODE: 'yes' }, true],
    [{ TICKLOG_DEBUG: 'off', DEBUG_MODE: 'on' }, false],
    [{ TICKLOG_DEBUG: ' TRUE ', NODE_ENV: 'production' }, true],
    [{ TICKLOG_DEBUG: 'maybe', NODE_ENV: 'production' }, false],
  ])('resolves %j to %s', (env, expected) => {
    expect(resolveDebug(env, undefined)).toBe(expected);
  });

  it('lets the build flag win over the environment', () => {
    expect(resolveDebug({ DEBUG_MODE: '1' }, false)).toBe(false);
    expect(resolveDebug({ NODE_ENV: 'production' }, true)).toBe(true);
  });
});

describe('debugSwitch', () => {
  it('keeps debug off when the build flag is false', () => {
    expect(debugSwitch(true, false)).toBe(false);
    expect(debugSwitch(undefined, false)).toBe(false);
  });

  it('honors an explicit request otherwise', () => {
    expect(debugSwitch(true, undefined)).toBe(true);
    expect(debugSwitch(false, true)).toBe(false);
    expect(debugSwitch(undefined, true)).toBe(true);
  });
});

describe('resolveConfig', () => {
  it('reads the color mode', () => {
    expect(resolveConfig({ TICKLOG_COLOR: 'OFF' }).color).toBe('off');
    expect(resolveConfig({ TICKLOG_COLOR: 'rainbow' }).color).toBe('auto');
    expect(resolveConfig({})).toEqual({ debug: true, color: 'auto' });
  });
});

describe('default sink', () => {
  afterEach(() => setDefaultSink(undefined));

  it('is shared by loggers created without a sink', () => {
    const sink = new MemorySink();
    setDefaultSink(sink);
    expect(getDefaultSink()).toBe(sink);
    new Logger('[A]').info('one');
    new Logger('[B]').warn('two');
    expect(sink.getLines()).toEqual(['[A][INFO] : one\n', '[B][WARN] : two\n']);
  });

  it('falls back to a console sink', () => {
    setDefaultSink(undefined);
    const sink = getDefaultSink();
    expect(sink).toBeInstanceOf(ConsoleSink);
    expect(getDefaultSink()).toBe(sink);
  });
});
