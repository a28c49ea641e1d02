/**
 * Subcycle Collector
 *
 * Records subcycle boundaries and, at every close, a snapshot of the closed
 * intervals of each stream. Each snapshot is an independent copy: the
 * interpreter discards its streams after the close.
 */

import { ControllerProgramError } from '../errors.js';
import { IntervalStream } from '../interval-stream.js';
import { TimeInterval } from '../time-interval.js';
import type { StreamName } from '../types.js';

export interface SubcycleSnapshot {
  index: number;
  interval: TimeInterval;
  streams: ReadonlyMap<StreamName, readonly TimeInterval[]>;
}

export class SubcycleCollector {
  private bounds = new IntervalStream('SUBCYCLE');
  private snapshots: SubcycleSnapshot[] = [];

  get isOn(): boolean {
    return this.bounds.isOn;
  }

  get isOff(): boolean {
    return this.bounds.isOff;
  }

  /** Number of closed subcycles */
  get count(): number {
    return this.snapshots.length;
  }

  open(time: number, line: number = 0): void {
    this.bounds.turnOn(time, line);
  }

  /**
   * Close the running subcycle and snapshot the streams.
   *
   * @throws ControllerProgramError when one of the streams is still on
   */
  close(time: number, line: number, streams: ReadonlyMap<StreamName, IntervalStream>): SubcycleSnapshot {
    for (const stream of streams.values()) {
      if (stream.isOn) {
        throw new ControllerProgramError(
          `Data stream ${stream.name} is still on at the end of subcycle ${this.snapshots.length}!`,
          line
        );
      }
    }

    this.bounds.turnOff(time, line);

    const copy = new Map<StreamName, readonly TimeInterval[]>();
    for (const [name, stream] of streams) {
      copy.set(name, stream.intervals);
    }
    const snapshot: SubcycleSnapshot = {
      index: this.snapshots.length,
      interval: new TimeInterval(this.bounds.lastTurnOn, time),
      streams: copy,
    };
    this.snapshots.push(snapshot);
    return snapshot;
  }

  get intervals(): TimeInterval[] {
    return this.snapshots.map((s) => s.interval);
  }

  /**
   * @throws RangeError for a subcycle that has not been closed
   */
  subcycle(index: number): SubcycleSnapshot {
    const snapshot = this.snapshots[index];
    if (snapshot === undefined) {
      throw new RangeError(`Subcycle ${index} does not exist (${this.snapshots.length} recorded)`);
    }
    return snapshot;
  }

  all(): readonly SubcycleSnapshot[] {
    return this.snapshots;
  }
}
