import { AnsiColor } from './types';
import { colorize } from './format';

/**
 * Pass/fail counter for test harnesses built on the logger
 */
export class Tally {
  private totalCount = 0;
  private passedCount = 0;

  add(passed: boolean): this {
    this.totalCount++;
    if (passed) this.passedCount++;
    return this;
  }

  get total(): number {
    return this.totalCount;
  }

  get passed(): number {
    return this.passedCount;
  }

  get failed(): number {
    return this.totalCount - this.passedCount;
  }

  /** Fold another tally's counts into this one */
  merge(other: Tally): this {
    this.totalCount += other.total;
    this.passedCount += other.passed;
    return this;
  }

  /** Yellow `[passed/total]` */
  toString(): string {
    return colorize(AnsiColor.Yellow, `[${this.passedCount}/${this.totalCount}]`);
  }
}
