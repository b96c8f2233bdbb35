import { describe, expect, it } from 'vitest';

import { AngularDirection, SeriesKind } from '@/enums';
import { buildPolygon, buildRadarPolygons, rechartsAngles, TASK_SERIES_NAME, toRadarRows } from '@/lib/fit/radar';
import { createTaskVector } from '@/lib/fit/session';
import { ShapeError } from '@/lib/fit/errors';
import { getPreset } from '@/data/presets';

const CLOCKWISE_FROM_TOP = { direction: AngularDirection.Clockwise, rotation: 90 };

describe('buildPolygon', () => {
  it('returns N + 1 points and closes the ring', () => {
    const points = buildPolygon(['A', 'B', 'C', 'D'], [1, 2, 3, 4]);
    expect(points).toHaveLength(5);
    expect(points[4]).toEqual(points[0]);
    expect(points.map(p => p.radius)).toEqual([1, 2, 3, 4, 1]);
    expect(points.map(p => p.dimension)).toEqual(['A', 'B', 'C', 'D', 'A']);
  });

  it('spaces axes evenly, counterclockwise from zero by default', () => {
    const angles = buildPolygon(['A', 'B', 'C', 'D'], [1, 1, 1, 1]).map(p => p.angle);
    expect(angles[0]).toBe(0);
    expect(angles[1]).toBeCloseTo(Math.PI / 2, 10);
    expect(angles[2]).toBeCloseTo(Math.PI, 10);
    expect(angles[3]).toBeCloseTo((3 * Math.PI) / 2, 10);
  });

  it('applies rotation and direction', () => {
    const angles = buildPolygon(['A', 'B', 'C', 'D'], [1, 1, 1, 1], CLOCKWISE_FROM_TOP).map(p => p.angle);
    expect(angles[0]).toBeCloseTo(Math.PI / 2, 10);
    expect(angles[1]).toBe(0);
    expect(angles[2]).toBeCloseTo((3 * Math.PI) / 2, 10);
    expect(angles[3]).toBeCloseTo(Math.PI, 10);
    expect(angles[4]).toBe(angles[0]);
  });

  it('repeats the single point of a one-dimension vector', () => {
    expect(buildPolygon(['A'], [7])).toEqual([
      { dimension: 'A', angle: 0, radius: 7 },
      { dimension: 'A', angle: 0, radius: 7 },
    ]);
  });

  it('rejects mismatched or empty input', () => {
    expect(() => buildPolygon(['A', 'B'], [1])).toThrow(ShapeError);
    expect(() => buildPolygon([], [])).toThrow(ShapeError);
  });
});

describe('buildRadarPolygons / toRadarRows', () => {
  const model = getPreset('standard');
  const polygons = buildRadarPolygons(model, createTaskVector(model), CLOCKWISE_FROM_TOP);

  it('draws every profile and then the task', () => {
    expect(polygons.map(p => p.name)).toEqual(['Human', 'System', 'AI', TASK_SERIES_NAME]);
    expect(polygons.map(p => p.kind)).toEqual([SeriesKind.Profile, SeriesKind.Profile, SeriesKind.Profile, SeriesKind.Task]);
    for (const poly of polygons) expect(poly.points).toHaveLength(11);
  });

  it('uses one orientation for every polygon', () => {
    const firstAngles = polygons.map(p => p.points[1].angle);
    expect(new Set(firstAngles).size).toBe(1);
  });

  it('pivots polygons into one row per dimension', () => {
    const rows = toRadarRows(model, polygons);
    expect(rows).toHaveLength(10);
    expect(rows[0]).toEqual({ dimension: 'Repeatability', Human: 9, System: 1, AI: 6, 'Your Task': 5 });
    expect(rows[9]).toEqual({ dimension: 'Cost', Human: 1, System: 9, AI: 6, 'Your Task': 5 });
  });

  it('refuses polygons that do not follow the dimension order', () => {
    const scrambled = buildPolygon(['Variation', 'Repeatability'], [1, 2]);
    expect(() =>
      toRadarRows({ dimensions: model.dimensions.slice(0, 2) }, [{ name: 'X', kind: SeriesKind.Task, points: scrambled }]),
    ).toThrow(ShapeError);
  });
});

describe('rechartsAngles', () => {
  it('maps an orientation onto start and end angles', () => {
    expect(rechartsAngles(CLOCKWISE_FROM_TOP)).toEqual({ startAngle: 90, endAngle: -270 });
    expect(rechartsAngles({ direction: AngularDirection.CounterClockwise, rotation: 0 })).toEqual({ startAngle: 0, endAngle: 360 });
  });
});
