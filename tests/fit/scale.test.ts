import { describe, expect, it } from 'vitest';

import {
  assertOnScaleGrid,
  clampToScale,
  isOnScaleGrid,
  mapToScale,
  roundHalfEven,
  scaleMidpoint,
  scaleTicks,
} from '@/lib/fit/scale';
import { ScaleRangeError } from '@/lib/fit/errors';

describe('roundHalfEven', () => {
  it('rounds ties to the even neighbour', () => {
    expect(roundHalfEven(5.5)).toBe(6);
    expect(roundHalfEven(4.5)).toBe(4);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(-2.5)).toBe(-2);
  });

  it('rounds everything else to the nearest integer', () => {
    expect(roundHalfEven(3.25)).toBe(3);
    expect(roundHalfEven(7.75)).toBe(8);
    expect(roundHalfEven(9)).toBe(9);
  });
});

describe('mapToScale', () => {
  it('preserves both endpoints', () => {
    expect(mapToScale(1, 1, 5, 1, 10)).toBe(1);
    expect(mapToScale(5, 1, 5, 1, 10)).toBe(10);
    expect(mapToScale(1, 1, 10, 1, 5)).toBe(1);
    expect(mapToScale(10, 1, 10, 1, 5)).toBe(5);
  });

  it('widens 1-5 scores onto 1-10', () => {
    // 3.25 -> 3, 5.5 -> 6 (tie to even), 7.75 -> 8
    expect([2, 3, 4].map(v => mapToScale(v, 1, 5, 1, 10))).toEqual([3, 6, 8]);
  });

  it('is the identity when both ranges match', () => {
    expect([1, 4, 7, 10].map(v => mapToScale(v, 1, 10, 1, 10))).toEqual([1, 4, 7, 10]);
  });

  it('keeps interior values inside the destination range', () => {
    for (let v = 2; v <= 9; v++) {
      const mapped = mapToScale(v, 1, 10, 1, 5);
      expect(mapped).toBeGreaterThanOrEqual(1);
      expect(mapped).toBeLessThanOrEqual(5);
    }
  });

  it('rejects values outside the source range', () => {
    expect(() => mapToScale(0, 1, 5, 1, 10)).toThrow(ScaleRangeError);
    expect(() => mapToScale(6, 1, 5, 1, 10)).toThrow(RangeError);
  });

  it('rejects a source range with no width', () => {
    expect(() => mapToScale(3, 3, 3, 1, 10)).toThrow(ScaleRangeError);
  });

  it('rejects non-finite input', () => {
    expect(() => mapToScale(Number.NaN, 1, 5, 1, 10)).toThrow(ScaleRangeError);
  });
});

describe('scale helpers', () => {
  const tenPoint = { min: 1, max: 10, step: 1 };

  it('clamps and snaps onto the step grid', () => {
    expect(clampToScale(tenPoint, 12)).toBe(10);
    expect(clampToScale(tenPoint, -3)).toBe(1);
    expect(clampToScale(tenPoint, 4.4)).toBe(4);
    expect(clampToScale(tenPoint, Number.NaN)).toBe(1);
  });

  it('starts sliders on the lower middle step', () => {
    expect(scaleMidpoint(tenPoint)).toBe(5);
    expect(scaleMidpoint({ min: 1, max: 5, step: 1 })).toBe(3);
    expect(scaleMidpoint({ min: 4, max: 4, step: 1 })).toBe(4);
  });

  it('lists every tick', () => {
    expect(scaleTicks({ min: 1, max: 5, step: 1 })).toEqual([1, 2, 3, 4, 5]);
  });

  it('never snaps past the last step of an uneven grid', () => {
    const odd = { min: 1, max: 10, step: 2 };
    expect(clampToScale(odd, 10.9)).toBe(9);
    expect(clampToScale(odd, 4)).toBe(5);
    expect(clampToScale(odd, 0)).toBe(1);
  });

  it('checks grid membership', () => {
    const odd = { min: 1, max: 9, step: 2 };
    expect(isOnScaleGrid(odd, 7)).toBe(true);
    expect(isOnScaleGrid(odd, 6)).toBe(false);
    expect(isOnScaleGrid(odd, 11)).toBe(false);
    expect(() => assertOnScaleGrid(odd, 6, 'Pace')).toThrow('Pace 6 is not a step of [1, 9] by 2');
    expect(() => assertOnScaleGrid(odd, 11, 'Pace')).toThrow('Pace 11 is outside [1, 9]');
  });
});
