/**
 * Frequency Series
 *
 * Sorted time → frequency record of the center frequency of one receive
 * channel.
 */

import { TimeInterval } from './time-interval.js';

export interface FrequencyPoint {
  time: number;
  /** MHz */
  frequency: number;
}

export class FrequencySeries {
  private points: FrequencyPoint[] = [];

  constructor(initial: Iterable<FrequencyPoint> = []) {
    for (const point of initial) {
      this.set(point.time, point.frequency);
    }
  }

  /**
   * Record a frequency. A value already recorded at the same time is replaced.
   */
  set(time: number, frequency: number): void {
    const index = this.upperBound(time);
    const previous = this.points[index - 1];
    if (previous !== undefined && previous.time === time) {
      previous.frequency = frequency;
      return;
    }
    this.points.splice(index, 0, { time, frequency });
  }

  get size(): number {
    return this.points.length;
  }

  get times(): number[] {
    return this.points.map((p) => p.time);
  }

  /** Distinct frequencies in order of first use */
  get frequencies(): number[] {
    return [...new Set(this.points.map((p) => p.frequency))];
  }

  entries(): FrequencyPoint[] {
    return this.points.map((p) => ({ ...p }));
  }

  /** Frequency in effect at `time`, or null before the first record */
  at(time: number): number | null {
    const index = this.upperBound(time) - 1;
    return index < 0 ? null : this.points[index].frequency;
  }

  /**
   * The frequency in effect when the interval begins, followed by every
   * change strictly inside it.
   *
   * @throws RangeError when the interval begins before the first record
   */
  shiftsWithin(interval: TimeInterval): FrequencySeries {
    const first = this.upperBound(interval.begin) - 1;
    if (first < 0) {
      throw new RangeError('TimeInterval begins before first frequency is defined!');
    }
    const result = new FrequencySeries();
    result.set(interval.begin, this.points[first].frequency);
    for (let i = first + 1; i < this.points.length; i++) {
      const point = this.points[i];
      if (point.time >= interval.end) break;
      result.set(point.time, point.frequency);
    }
    return result;
  }

  /**
   * Step-plot coordinates of the series over the interval: every value is
   * held until the next change or the end of the interval.
   */
  asLine(interval: TimeInterval): { times: number[]; frequencies: number[] } {
    const shifts = this.shiftsWithin(interval).points;
    const times: number[] = [];
    const frequencies: number[] = [];
    shifts.forEach((point, i) => {
      const until = shifts[i + 1]?.time ?? interval.end;
      times.push(point.time, until);
      frequencies.push(point.frequency, point.frequency);
    });
    return { times, frequencies };
  }

  toJSON(): FrequencyPoint[] {
    return this.entries();
  }

  /** Index of the first point later than `time` */
  private upperBound(time: number): number {
    let lo = 0;
    let hi = this.points.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (this.points[mid].time <= time) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}
