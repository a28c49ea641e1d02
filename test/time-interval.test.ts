/**
 * TimeInterval Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import fc from 'fast-check';
import { TimeInterval } from '../src/time-interval.js';
import { OverlapError } from '../src/errors.js';

const seconds = fc.double({ min: 0, max: 1, noNaN: true });

describe('TimeInterval', () => {
  it('should default to an empty interval at 0', () => {
    const interval = new TimeInterval();
    assert.strictEqual(interval.begin, 0);
    assert.strictEqual(interval.end, 0);
    assert.strictEqual(interval.length, 0);
  });

  it('length should be end minus begin for every valid interval', () => {
    fc.assert(
      fc.property(seconds, seconds, (a, b) => {
        const [begin, end] = a <= b ? [a, b] : [b, a];
        assert.strictEqual(new TimeInterval(begin, end).length, end - begin);
      })
    );
  });

  it('should refuse to end before it begins', () => {
    fc.assert(
      fc.property(seconds, seconds, (a, b) => {
        fc.pre(a !== b);
        const [begin, end] = a > b ? [a, b] : [b, a];
        assert.throws(() => new TimeInterval(begin, end), RangeError);
      })
    );
  });

  it('should refuse negative and non-finite bounds', () => {
    assert.throws(() => new TimeInterval(-1, 2), RangeError);
    assert.throws(() => new TimeInterval(0, NaN), RangeError);
    assert.throws(() => new TimeInterval(0, Infinity), RangeError);
    assert.throws(() => new TimeInterval(1).divide(0), RangeError);
  });

  it('should scale and divide both ends', () => {
    const interval = new TimeInterval(2, 6);
    assert.deepStrictEqual(interval.scale(3).toTuple(), [6, 18]);
    assert.deepStrictEqual(interval.divide(2).toTuple(), [1, 3]);
  });

  it('should compare by value', () => {
    assert.ok(new TimeInterval(1, 2).equals(new TimeInterval(1, 2)));
    assert.ok(!new TimeInterval(1, 2).equals(new TimeInterval(1, 3)));
  });

  it('should format like a constructor call', () => {
    assert.strictEqual(String(new TimeInterval(1, 2.5)), 'TimeInterval(1, 2.5)');
    assert.strictEqual(JSON.stringify(new TimeInterval(1, 2)), '{"begin":1,"end":2}');
  });
});

describe('Overlap', () => {
  it('should detect overlapping intervals in both directions', () => {
    const a = new TimeInterval(0, 10);
    const b = new TimeInterval(5, 15);
    assert.ok(a.overlapsWith(b));
    assert.ok(b.overlapsWith(a));
  });

  it('should not count touching intervals as overlapping', () => {
    const a = new TimeInterval(0, 10);
    const b = new TimeInterval(10, 20);
    assert.ok(!a.overlapsWith(b));
    assert.ok(!b.overlapsWith(a));
  });

  it('should treat a contained interval as overlapping', () => {
    assert.ok(new TimeInterval(0, 10).overlapsWith(new TimeInterval(2, 3)));
  });

  it('should check a list', () => {
    const tx = new TimeInterval(40, 220);
    assert.ok(tx.overlapsAny([new TimeInterval(0, 10), new TimeInterval(200, 300)]));
    assert.ok(!tx.overlapsAny([new TimeInterval(0, 10), new TimeInterval(300, 400)]));
  });

  it('should throw OverlapError when checking overlapping intervals', () => {
    const tx = new TimeInterval(40, 220);
    assert.throws(() => tx.checkOverlap(new TimeInterval(100, 300)), OverlapError);
    assert.doesNotThrow(() => tx.checkOverlap(new TimeInterval(220, 300)));
  });

  it('overlap should be symmetric', () => {
    fc.assert(
      fc.property(seconds, seconds, seconds, seconds, (a, b, c, d) => {
        const x = new TimeInterval(Math.min(a, b), Math.max(a, b));
        const y = new TimeInterval(Math.min(c, d), Math.max(c, d));
        assert.strictEqual(x.overlapsWith(y), y.overlapsWith(x));
      })
    );
  });
});

describe('Containment', () => {
  it('should allow shared boundaries', () => {
    const outer = new TimeInterval(0, 10);
    assert.ok(new TimeInterval(0, 10).within(outer));
    assert.ok(new TimeInterval(2, 10).within(outer));
    assert.ok(!new TimeInterval(2, 11).within(outer));
  });

  it('should check a list', () => {
    const subcycles = [new TimeInterval(0, 10), new TimeInterval(10, 20)];
    assert.ok(new TimeInterval(12, 15).withinAny(subcycles));
    assert.ok(!new TimeInterval(8, 12).withinAny(subcycles));
  });
});
