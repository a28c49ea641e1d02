/**
 * Interval Stream
 *
 * On/off history of one named hardware line. Only the last entry may be
 * open; every earlier entry has both an on and an off time.
 */

import { ControllerProgramError, StreamStateError } from './errors.js';
import { TimeInterval } from './time-interval.js';

interface StreamEntry {
  on: number;
  off: number | null;
}

export class IntervalStream {
  readonly name: string;
  private entries: StreamEntry[] = [];

  constructor(name: string) {
    this.name = name;
  }

  get isOn(): boolean {
    const last = this.entries[this.entries.length - 1];
    return last !== undefined && last.off === null;
  }

  get isOff(): boolean {
    return !this.isOn;
  }

  /** Number of entries, the open one included */
  get count(): number {
    return this.entries.length;
  }

  /**
   * @param line line in the controller program, for error messages only
   */
  turnOn(time: number, line: number = 0): void {
    if (this.isOn) {
      throw new ControllerProgramError(`Data stream ${this.name} is already on!`, line);
    }
    this.entries.push({ on: time, off: null });
  }

  turnOff(time: number, line: number = 0): void {
    const last = this.entries[this.entries.length - 1];
    if (last === undefined || last.off !== null) {
      throw new ControllerProgramError(`Data stream ${this.name} is already off!`, line);
    }
    if (time < last.on) {
      throw new ControllerProgramError(
        `Data stream ${this.name} cannot turn off before it was turned on`,
        line
      );
    }
    last.off = time;
  }

  /**
   * Closed on-periods. Not available while the stream is on.
   */
  get intervals(): TimeInterval[] {
    if (this.isOn) {
      throw new StreamStateError(`Stream ${this.name} is on. Cannot return open intervals.`);
    }
    return this.entries.map((entry) => new TimeInterval(entry.on, entry.off ?? entry.on));
  }

  get lastTurnOn(): number {
    const last = this.entries[this.entries.length - 1];
    if (last === undefined) {
      throw new StreamStateError(`Stream ${this.name} has not been turned on yet!`);
    }
    return last.on;
  }

  get lastTurnOff(): number {
    const last = this.entries[this.entries.length - 1];
    if (last === undefined) {
      throw new StreamStateError(`Stream ${this.name} has not been turned on yet!`);
    }
    if (last.off !== null) {
      return last.off;
    }
    const previous = this.entries[this.entries.length - 2];
    if (previous === undefined || previous.off === null) {
      throw new StreamStateError(`Stream ${this.name} is on, but has not been turned off yet!`);
    }
    return previous.off;
  }
}
