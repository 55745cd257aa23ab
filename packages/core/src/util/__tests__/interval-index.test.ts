import { describe, it, expect } from 'vitest';
import { IntervalIndex } from '../interval-index.js';

describe('IntervalIndex', () => {
  const index = new IntervalIndex([1, 2, 0, 3]);

  it('lays intervals end to end from zero', () => {
    expect(index.size).toBe(4);
    expect(index.total).toBe(6);
    expect(index.limits(0)).toEqual([0, 1]);
    expect(index.limits(1)).toEqual([1, 3]);
    expect(index.limits(2)).toEqual([3, 3]);
    expect(index.limits(3)).toEqual([3, 6]);
  });

  it('treats intervals as half-open', () => {
    expect(index.locate(0)).toBe(0);
    expect(index.locate(0.999)).toBe(0);
    expect(index.locate(1)).toBe(1);
    expect(index.locate(2.5)).toBe(1);
  });

  it('never matches an empty interval', () => {
    expect(index.locate(3)).toBe(3);
  });

  it('resolves the right edge to the last non-empty interval', () => {
    expect(index.locate(6)).toBe(3);
    expect(index.locate(100)).toBe(3);
    expect(new IntervalIndex([2, 1, 0, 0]).locate(3)).toBe(1);
  });

  it('matches exactly one interval for every point in [0, total)', () => {
    const widths = [0.5, 0, 1.25, 0.25, 2];
    const idx = new IntervalIndex(widths);
    for (let x = 0; x < idx.total; x += 0.125) {
      const i = idx.locate(x);
      const [start, end] = idx.limits(i);
      expect(start).toBeLessThanOrEqual(x);
      expect(end).toBeGreaterThan(x);
    }
  });

  it('returns -1 when every interval is empty', () => {
    expect(new IntervalIndex([0, 0]).locate(0)).toBe(-1);
    expect(new IntervalIndex([]).locate(0)).toBe(-1);
  });

  it('rejects invalid widths and points', () => {
    expect(() => new IntervalIndex([1, -1])).toThrow(RangeError);
    expect(() => new IntervalIndex([Number.NaN])).toThrow(RangeError);
    expect(() => index.locate(-0.5)).toThrow(RangeError);
    expect(() => index.locate(Number.NaN)).toThrow(RangeError);
    expect(() => index.limits(4)).toThrow(RangeError);
  });
});
