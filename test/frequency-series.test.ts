/**
 * FrequencySeries Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { FrequencySeries } from '../src/frequency-series.js';
import { TimeInterval } from '../src/time-interval.js';

function sample(): FrequencySeries {
  return new FrequencySeries([
    { time: 1, frequency: 100 },
    { time: 2, frequency: 135 },
    { time: 5, frequency: 274 },
    { time: 23, frequency: 34 },
  ]);
}

describe('FrequencySeries', () => {
  it('should keep points sorted by time', () => {
    const series = new FrequencySeries();
    series.set(5, 274);
    series.set(1, 100);
    series.set(2, 135);
    assert.deepStrictEqual(series.times, [1, 2, 5]);
    assert.strictEqual(series.size, 3);
  });

  it('should replace a value at the same time', () => {
    const series = sample();
    series.set(2, 140);
    assert.strictEqual(series.size, 4);
    assert.strictEqual(series.at(2), 140);
  });

  it('should answer the frequency in effect', () => {
    const series = sample();
    assert.strictEqual(series.at(0), null);
    assert.strictEqual(series.at(1), 100);
    assert.strictEqual(series.at(4.9), 135);
    assert.strictEqual(series.at(5), 274);
    assert.strictEqual(series.at(100), 34);
  });

  it('should list distinct frequencies in order of use', () => {
    const series = new FrequencySeries([
      { time: 1, frequency: 100 },
      { time: 2, frequency: 135 },
      { time: 3, frequency: 100 },
    ]);
    assert.deepStrictEqual(series.frequencies, [100, 135]);
  });

  it('should start the shifts within an interval with the frequency in effect', () => {
    const shifts = sample().shiftsWithin(new TimeInterval(3, 10));
    assert.deepStrictEqual(shifts.entries(), [
      { time: 3, frequency: 135 },
      { time: 5, frequency: 274 },
    ]);
  });

  it('should refuse an interval before the first point', () => {
    assert.throws(() => sample().shiftsWithin(new TimeInterval(0, 2)), RangeError);
  });
});

describe('Step line', () => {
  it('should hold each value until the next change', () => {
    assert.deepStrictEqual(sample().asLine(new TimeInterval(1, 5)), {
      times: [1, 2, 2, 5],
      frequencies: [100, 100, 135, 135],
    });
    assert.deepStrictEqual(sample().asLine(new TimeInterval(1, 2)), {
      times: [1, 2],
      frequencies: [100, 100],
    });
  });

  it('should run to the end of the interval', () => {
    assert.deepStrictEqual(sample().asLine(new TimeInterval(1, 24)), {
      times: [1, 2, 2, 5, 5, 23, 23, 24],
      frequencies: [100, 100, 135, 135, 274, 274, 34, 34],
    });
  });

  it('should refuse to begin before the first point', () => {
    assert.throws(() => sample().asLine(new TimeInterval(0, 2)), /before first frequency/);
  });
});
