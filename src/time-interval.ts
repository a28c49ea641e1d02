/**
 * Time Interval
 *
 * One closed period [begin, end] in seconds during which a hardware line is on.
 */

import { OverlapError } from './errors.js';

export class TimeInterval {
  readonly begin: number;
  readonly end: number;

  /**
   * @throws RangeError when a bound is negative or not finite, or when end
   * comes before begin
   */
  constructor(begin: number = 0, end: number = 0) {
    if (!Number.isFinite(begin) || !Number.isFinite(end) || begin < 0) {
      throw new RangeError(`Interval bounds must be finite and not negative (${begin}, ${end})`);
    }
    if (end < begin) {
      throw new RangeError(`Start of interval must come before end (${begin} > ${end})`);
    }
    this.begin = begin;
    this.end = end;
  }

  get length(): number {
    return this.end - this.begin;
  }

  scale(factor: number): TimeInterval {
    return new TimeInterval(this.begin * factor, this.end * factor);
  }

  divide(divisor: number): TimeInterval {
    return new TimeInterval(this.begin / divisor, this.end / divisor);
  }

  equals(other: TimeInterval): boolean {
    return this.begin === other.begin && this.end === other.end;
  }

  /**
   * Intervals that only touch at a boundary do not overlap.
   */
  overlapsWith(other: TimeInterval): boolean {
    if (this.begin <= other.end && this.end <= other.begin) return false;
    if (other.begin <= this.end && other.end <= this.begin) return false;
    return true;
  }

  overlapsAny(others: readonly TimeInterval[]): boolean {
    return others.some((iv) => this.overlapsWith(iv));
  }

  checkOverlap(other: TimeInterval): void {
    if (this.overlapsWith(other)) {
      throw new OverlapError(`${this} overlaps ${other}`);
    }
  }

  /**
   * True if this interval lies inside the other one. Shared boundaries are
   * allowed; numerical error is not accounted for.
   */
  within(other: TimeInterval): boolean {
    return other.begin <= this.begin && this.end <= other.end;
  }

  withinAny(others: readonly TimeInterval[]): boolean {
    return others.some((iv) => this.within(iv));
  }

  toTuple(): [number, number] {
    return [this.begin, this.end];
  }

  toString(): string {
    return `TimeInterval(${this.begin}, ${this.end})`;
  }

  toJSON(): { begin: number; end: number } {
    return { begin: this.begin, end: this.end };
  }
}
