import { describe, expect, it } from 'vitest';

import type { Dimension } from '@/types';
import { buildProfileRegistry } from '@/lib/fit/profiles';
import { TASK_SERIES_NAME } from '@/lib/fit/radar';
import { ScaleRangeError, ShapeError } from '@/lib/fit/errors';

function mkDims(...names: string[]): Dimension[] {
  return names.map(name => ({ name, question: `${name}?`, low: 'Low', high: 'High' }));
}

const TEN = { min: 1, max: 10, step: 1 };

describe('buildProfileRegistry', () => {
  it('maps raw scores from the source scale onto the canonical scale', () => {
    const registry = buildProfileRegistry(
      [{ name: 'Human', raw: [5, 2, 3] }],
      mkDims('A', 'B', 'C'),
      { min: 1, max: 5 },
      TEN,
    );
    expect(registry.get('Human')?.values).toEqual([10, 3, 6]);
  });

  it('passes canonical scores through when there is no source scale', () => {
    const registry = buildProfileRegistry([{ name: 'AI', raw: [6, 8] }], mkDims('A', 'B'), undefined, TEN);
    expect(registry.get('AI')?.values).toEqual([6, 8]);
  });

  it('keeps the authored order', () => {
    const registry = buildProfileRegistry(
      [
        { name: 'Human', raw: [1] },
        { name: 'System', raw: [2] },
        { name: 'AI', raw: [3] },
      ],
      mkDims('A'),
      undefined,
      TEN,
    );
    expect(Array.from(registry.keys())).toEqual(['Human', 'System', 'AI']);
  });

  it('freezes profiles', () => {
    const registry = buildProfileRegistry([{ name: 'Human', raw: [1, 2] }], mkDims('A', 'B'), undefined, TEN);
    const human = registry.get('Human');
    expect(Object.isFrozen(human)).toBe(true);
    expect(Object.isFrozen(human?.values)).toBe(true);
  });

  it('names the profile and dimension of an out-of-range score', () => {
    expect(() =>
      buildProfileRegistry([{ name: 'Human', raw: [1, 11] }], mkDims('A', 'B'), undefined, TEN),
    ).toThrow('Profile "Human", dimension "B": score 11 is outside [1, 10]');
  });

  it('surfaces mapper errors as ScaleRangeError', () => {
    expect(() =>
      buildProfileRegistry([{ name: 'Human', raw: [6] }], mkDims('A'), { min: 1, max: 5 }, TEN),
    ).toThrow(ScaleRangeError);
  });

  it('rejects profiles whose length differs from the dimensions', () => {
    expect(() =>
      buildProfileRegistry([{ name: 'Human', raw: [1, 2] }], mkDims('A', 'B', 'C'), undefined, TEN),
    ).toThrow(ShapeError);
  });

  it('rejects empty and duplicate profile sets', () => {
    expect(() => buildProfileRegistry([], mkDims('A'), undefined, TEN)).toThrow(ShapeError);
    expect(() => buildProfileRegistry([{ name: 'Human', raw: [] }], [], undefined, TEN)).toThrow(ShapeError);
    expect(() =>
      buildProfileRegistry(
        [
          { name: 'Human', raw: [1] },
          { name: 'Human', raw: [2] },
        ],
        mkDims('A'),
        undefined,
        TEN,
      ),
    ).toThrow('Duplicate profile name "Human"');
  });

  it('rejects profile names that would collide with chart row keys', () => {
    expect(() =>
      buildProfileRegistry([{ name: TASK_SERIES_NAME, raw: [9, 9] }], mkDims('A', 'B'), undefined, TEN),
    ).toThrow('Profile name "Your Task" is reserved for the chart');
    expect(() =>
      buildProfileRegistry([{ name: 'dimension', raw: [9, 9] }], mkDims('A', 'B'), undefined, TEN),
    ).toThrow(ShapeError);
  });
});
