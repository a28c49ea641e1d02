/**
 * IntervalStream Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import fc from 'fast-check';
import { IntervalStream } from '../src/interval-stream.js';
import { ControllerProgramError, StreamStateError } from '../src/errors.js';
import { TimeInterval } from '../src/time-interval.js';

describe('IntervalStream', () => {
  it('should start off and empty', () => {
    const stream = new IntervalStream('RF');
    assert.strictEqual(stream.isOff, true);
    assert.strictEqual(stream.isOn, false);
    assert.strictEqual(stream.count, 0);
    assert.deepStrictEqual(stream.intervals, []);
  });

  it('should refuse to turn on twice', () => {
    const stream = new IntervalStream('RF');
    stream.turnOn(1, 3);
    assert.throws(
      () => stream.turnOn(2, 4),
      (error: unknown) =>
        error instanceof ControllerProgramError &&
        error.line === 4 &&
        error.message === 'The .tlan file has errors in line 4: Data stream RF is already on!'
    );
  });

  it('should refuse to turn off when off', () => {
    const stream = new IntervalStream('CH1');
    assert.throws(() => stream.turnOff(1), /Data stream CH1 is already off!/);
    stream.turnOn(1);
    stream.turnOff(2);
    assert.throws(() => stream.turnOff(3), /already off/);
  });

  it('should refuse to turn off before the turn on', () => {
    const stream = new IntervalStream('CH1');
    stream.turnOn(5);
    assert.throws(() => stream.turnOff(4), /cannot turn off before it was turned on/);
  });

  it('on then off should give exactly that interval', () => {
    fc.assert(
      fc.property(fc.double({ min: 0, max: 1, noNaN: true }), fc.double({ min: 0, max: 1, noNaN: true }), (a, b) => {
        const [on, off] = a <= b ? [a, b] : [b, a];
        const stream = new IntervalStream('RF');
        stream.turnOn(on);
        stream.turnOff(off);
        assert.deepStrictEqual(stream.intervals, [new TimeInterval(on, off)]);
      })
    );
  });

  it('should keep intervals in order', () => {
    const stream = new IntervalStream('CAL');
    stream.turnOn(1);
    stream.turnOff(2);
    stream.turnOn(5);
    stream.turnOff(8);
    assert.deepStrictEqual(
      stream.intervals.map((iv) => iv.toTuple()),
      [
        [1, 2],
        [5, 8],
      ]
    );
    assert.strictEqual(stream.count, 2);
  });

  it('should not give intervals while on', () => {
    const stream = new IntervalStream('RF');
    stream.turnOn(1);
    assert.throws(() => stream.intervals, StreamStateError);
  });

  it('should report the last toggles', () => {
    const stream = new IntervalStream('RF');
    assert.throws(() => stream.lastTurnOn, StreamStateError);
    assert.throws(() => stream.lastTurnOff, StreamStateError);

    stream.turnOn(1);
    assert.strictEqual(stream.lastTurnOn, 1);
    assert.throws(() => stream.lastTurnOff, /has not been turned off yet/);

    stream.turnOff(2);
    stream.turnOn(3);
    assert.strictEqual(stream.lastTurnOn, 3);
    // Still on: the previous off time
    assert.strictEqual(stream.lastTurnOff, 2);

    stream.turnOff(4);
    assert.strictEqual(stream.lastTurnOff, 4);
  });
});
