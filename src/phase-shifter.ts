/**
 * Phase Shifter
 *
 * Time-ordered record of the transmitter phase (0° or 180°) and the baud
 * length derived from it.
 */

import type { Phase, TimedEvent } from './types.js';
import { NS } from './types.js';
import { TimeInterval } from './time-interval.js';

function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

export class PhaseShifter {
  // Private so that the list stays sorted
  private shifts: TimedEvent<Phase>[] = [];
  private usedPhases: Phase[] = [];

  /**
   * Insert a phase event. Events at equal times keep their insertion order.
   */
  setPhase(time: number, phase: Phase): void {
    let index = this.shifts.length;
    while (index > 0 && this.shifts[index - 1].time > time) {
      index--;
    }
    this.shifts.splice(index, 0, { time, event: phase });
    if (!this.usedPhases.includes(phase)) {
      this.usedPhases.push(phase);
    }
  }

  pha0(time: number): void {
    this.setPhase(time, 0);
  }

  pha180(time: number): void {
    this.setPhase(time, 180);
  }

  /**
   * Forget the history but keep the phase the shifter is left in, at time 0.
   */
  restart(): void {
    const last = this.shifts[this.shifts.length - 1];
    if (last === undefined) return;
    this.shifts = [];
    this.setPhase(0, last.event);
  }

  get phaseShifts(): readonly TimedEvent<Phase>[] {
    return this.shifts;
  }

  get phases(): readonly Phase[] {
    return this.usedPhases;
  }

  /** Phase in effect at `time`, or null before the first event */
  phaseAt(time: number): Phase | null {
    let phase: Phase | null = null;
    for (const shift of this.shifts) {
      if (shift.time > time) break;
      phase = shift.event;
    }
    return phase;
  }

  /**
   * Events inside the interval (boundaries included). When an event precedes
   * the interval, the phase it set is carried forward as a first, synthetic
   * event at `interval.begin`.
   */
  phaseShiftsWithin(interval: TimeInterval): TimedEvent<Phase>[] {
    const inside: TimedEvent<Phase>[] = [];
    let before: TimedEvent<Phase> | undefined;
    for (const shift of this.shifts) {
      if (shift.time < interval.begin) {
        before = shift;
      } else if (shift.time <= interval.end) {
        inside.push({ ...shift });
      }
    }
    if (before !== undefined) {
      inside.unshift({ time: interval.begin, event: before.event });
    }
    return inside;
  }

  /**
   * Greatest common divisor of the gaps between the phase events inside the
   * interval, with every gap rounded to whole nanoseconds.
   *
   * Known limitation: a code that holds its phase for two or more bauds in a
   * row everywhere yields a multiple of the true baud length, and nothing
   * detects it.
   *
   * @returns baud length in seconds, or null with fewer than two events
   */
  estimateBaudLength(interval: TimeInterval): number | null {
    const times = this.shifts
      .filter((shift) => shift.time >= interval.begin && shift.time <= interval.end)
      .map((shift) => shift.time);
    if (times.length < 2) {
      return null;
    }
    let divisor = 0;
    for (let i = 1; i < times.length; i++) {
      const gapNs = Math.round((times[i] - times[i - 1]) / NS);
      divisor = gcd(divisor, gapNs);
    }
    return divisor === 0 ? null : divisor / 1e9;
  }
}
