import { describe, expect, it, vi } from 'vitest';
import { HierarchyTimer } from './hierarchy';
import type { Clock } from './timer';
import { MemorySink } from './sinks';
import { TimeUnit } from './units';

function ticks(...readings: number[]): Clock {
  let i = 0;
  return () => readings[Math.min(i++, readings.length - 1)];
}

describe('HierarchyTimer', () => {
  it('brackets sub-tasks between an opening and a closing line', () => {
    const sink = new MemorySink();
    const timer = new HierarchyTimer('build', { sink, clock: ticks(0, 1, 3, 4, 7, 10) });
    const parse = vi.fn();

    expect(timer.subTask('parse', parse)).toBe(2);
    expect(timer.subTask('emit', () => undefined)).toBe(3);
    expect(timer.stop()).toBe(10);

    expect(parse).toHaveBeenCalledTimes(1);
    expect(sink.getLines()).toEqual([
      '[TIMER] : build {\n',
      '\t[TIMER][SUB] : [2.000 ms] : parse\n',
      '\t[TIMER][SUB] : [3.000 ms] : emit\n',
      '[TIMER] : } [10.000 ms] : build (sub-tasks [5.000 ms])\n',
    ]);
  });

  it('keeps its total independent of the sub-task sum', () => {
    const timer = new HierarchyTimer('t', { sink: new MemorySink(), clock: ticks(0, 1, 3, 4, 7, 10) });
    timer.subTask('a', () => undefined);
    timer.subTask('b', () => undefined);
    const total = timer.stop();
    expect(timer.subTaskTotal).toBe(5);
    expect(total).toBe(10);
  });

  it('indents nested sub-tasks and counts only the outer one', () => {
    const sink = new MemorySink();
    const timer = new HierarchyTimer('nest', { sink, clock: ticks(0, 1, 2, 4, 6) });

    timer.subTask('outer', () => {
      timer.subTask('inner', () => undefined);
    });

    expect(timer.subTaskTotal).toBe(5);
    expect(sink.getLines().slice(1)).toEqual([
      '\t\t[TIMER][SUB] : [2.000 ms] : inner\n',
      '\t[TIMER][SUB] : [5.000 ms] : outer\n',
    ]);
  });

  it('shows a sub-task in its own display unit', () => {
    const sink = new MemorySink();
    const timer = new HierarchyTimer('units', { sink, clock: ticks(0, 1, 3) });
    expect(timer.subTask('fine', () => undefined, TimeUnit.Microseconds)).toBe(2000);
    expect(timer.subTaskTotal).toBe(2);
    expect(sink.getLines()[1]).toBe('\t[TIMER][SUB] : [2000.000 us] : fine\n');
  });

  it('starts at the requested depth', () => {
    const sink = new MemorySink();
    const timer = new HierarchyTimer('child', { sink, depth: 1, clock: ticks(0, 0, 1, 2) });
    timer.subTask('leaf', () => undefined);
    timer.stop();
    expect(sink.getLines()).toEqual([
      '\t[TIMER] : child {\n',
      '\t\t[TIMER][SUB] : [1.000 ms] : leaf\n',
      '\t[TIMER] : } [2.000 ms] : child (sub-tasks [1.000 ms])\n',
    ]);
  });

  it('treats a non-finite depth as the top level', () => {
    const sink = new MemorySink();
    const timer = new HierarchyTimer('flat', { sink, depth: Infinity, clock: ticks(0, 2) });
    expect(timer.depth).toBe(0);
    timer.stop();
    expect(sink.getLines()).toEqual([
      '[TIMER] : flat {\n',
      '[TIMER] : } [2.000 ms] : flat (sub-tasks [0.000 ms])\n',
    ]);
  });

  it('restores its nesting after a sub-task throws', () => {
    const sink = new MemorySink();
    const timer = new HierarchyTimer('recover', { sink, clock: ticks(0, 1, 2, 5, 9) });
    expect(() =>
      timer.subTask('fails', () => {
        throw new Error('bad step');
      }),
    ).toThrow('bad step');
    timer.subTask('next', () => undefined);
    expect(timer.subTaskTotal).toBe(3);
    expect(sink.getLines().slice(1)).toEqual(['\t[TIMER][SUB] : [3.000 ms] : next\n']);
  });

  it('only warns when stopped twice', () => {
    const sink = new MemorySink();
    const timer = new HierarchyTimer('twice', { sink, clock: ticks(0, 1) });
    timer.stop();
    expect(timer.stop()).toBeUndefined();
    expect(sink.getLines('err')).toEqual(['[TIMER][WARN] : Trying to stop timer but timer is not running.\n']);
  });

  it('closes a scope even when the body throws', () => {
    const sink = new MemorySink();
    expect(() =>
      HierarchyTimer.scope('scoped', (timer) => {
        timer.subTask('step', () => undefined);
        throw new Error('abort');
      }, { sink, clock: ticks(0, 1, 2, 4) }),
    ).toThrow('abort');
    expect(sink.getLines()).toEqual([
      '[TIMER] : scoped {\n',
      '\t[TIMER][SUB] : [1.000 ms] : step\n',
      '[TIMER] : } [4.000 ms] : scoped (sub-tasks [1.000 ms])\n',
    ]);
  });
});
