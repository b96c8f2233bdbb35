// lib/fit/radar.ts
import { AngularDirection, SeriesKind } from '../../enums';
import type { FitModel, PolarPoint, RadarOrientation, RadarPolygon, Vector } from '../../types';
import { ShapeError } from './errors';

export const TASK_SERIES_NAME = 'Your Task';

/** Keys a radar row already uses, so no profile may be called by them. */
export const RESERVED_SERIES_NAMES: readonly string[] = ['dimension', TASK_SERIES_NAME];

export const DEFAULT_ORIENTATION: RadarOrientation = {
  direction: AngularDirection.CounterClockwise,
  rotation: 0,
};

// Degrees throughout; radians only on the way out.
function normalizeDegrees(deg: number): number {
  const r = deg % 360;
  return r < 0 ? r + 360 : r;
}

export function axisAngle(index: number, count: number, orientation: RadarOrientation = DEFAULT_ORIENTATION): number {
  const sign = orientation.direction === AngularDirection.Clockwise ? -1 : 1;
  const deg = normalizeDegrees(orientation.rotation + (sign * 360 * index) / count);
  return (deg * Math.PI) / 180;
}

/**
 * Lay `values` out on evenly spaced axes in `dimensionOrder` and close the ring:
 * the result has N + 1 points and the last one repeats the first.
 */
export function buildPolygon(
  dimensionOrder: readonly string[],
  values: Vector,
  orientation: RadarOrientation = DEFAULT_ORIENTATION,
): PolarPoint[] {
  const n = dimensionOrder.length;
  if (n < 1) throw new ShapeError('A radar polygon needs at least one dimension');
  if (values.length !== n) {
    throw new ShapeError(`buildPolygon: ${values.length} values for ${n} dimensions`);
  }

  const points: PolarPoint[] = dimensionOrder.map((dimension, i) => ({
    dimension,
    angle: axisAngle(i, n, orientation),
    radius: values[i],
  }));
  points.push({ ...points[0] });
  return points;
}

/** One polygon per profile, then the task on top, all sharing one orientation. */
export function buildRadarPolygons(
  model: FitModel,
  task: Vector,
  orientation: RadarOrientation = DEFAULT_ORIENTATION,
): RadarPolygon[] {
  const order = model.dimensions.map(d => d.name);
  const polygons: RadarPolygon[] = [];
  for (const profile of model.profiles.values()) {
    polygons.push({ name: profile.name, kind: SeriesKind.Profile, points: buildPolygon(order, profile.values, orientation) });
  }
  polygons.push({ name: TASK_SERIES_NAME, kind: SeriesKind.Task, points: buildPolygon(order, task, orientation) });
  return polygons;
}

export type RadarRow = { dimension: string } & Record<string, number | string>;

/**
 * Pivot polygons into one row per dimension ({ dimension, Human: 9, ... }), the shape
 * recharts' RadarChart wants. The closing point is dropped; recharts closes the ring itself.
 */
export function toRadarRows(model: Pick<FitModel, 'dimensions'>, polygons: readonly RadarPolygon[]): RadarRow[] {
  return model.dimensions.map((dim, i) => {
    const row: RadarRow = { dimension: dim.name };
    for (const poly of polygons) {
      const point = poly.points[i];
      if (!point || point.dimension !== dim.name) {
        throw new ShapeError(`Polygon "${poly.name}" does not follow the dimension order at "${dim.name}"`);
      }
      row[poly.name] = point.radius;
    }
    return row;
  });
}

/** recharts startAngle/endAngle (degrees) matching an orientation. */
export function rechartsAngles(orientation: RadarOrientation): { startAngle: number; endAngle: number } {
  const startAngle = orientation.rotation;
  const endAngle = orientation.direction === AngularDirection.Clockwise ? startAngle - 360 : startAngle + 360;
  return { startAngle, endAngle };
}
