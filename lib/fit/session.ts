// lib/fit/session.ts
// Everything a single slider change recomputes. The task vector belongs to the caller
// (one per session); nothing here keeps state between calls.

import type { FitEvaluation, FitModel, RadarOrientation, Vector } from '../../types';
import { ShapeError } from './errors';
import { buildRadarPolygons, DEFAULT_ORIENTATION } from './radar';
import { bestFit, rankScores } from './ranking';
import { assertOnScaleGrid, clampToScale, scaleMidpoint } from './scale';
import { scoreProfiles } from './score';

export function createTaskVector(model: FitModel): Vector {
  const mid = scaleMidpoint(model.scale);
  return Object.freeze(model.dimensions.map(() => mid));
}

export function dimensionIndex(model: FitModel, dimension: number | string): number {
  const index = typeof dimension === 'number' ? dimension : model.dimensions.findIndex(d => d.name === dimension);
  if (!Number.isInteger(index) || index < 0 || index >= model.dimensions.length) {
    throw new ShapeError(`Unknown dimension ${JSON.stringify(dimension)} in "${model.id}"`);
  }
  return index;
}

export function validateTaskVector(model: FitModel, task: Vector): void {
  if (task.length !== model.dimensions.length) {
    throw new ShapeError(`Task has ${task.length} values but "${model.id}" has ${model.dimensions.length} dimensions`);
  }
  task.forEach((v, i) => assertOnScaleGrid(model.scale, v, model.dimensions[i].name));
}

/** Copy of `task` with one dimension changed; the input vector is left as is. */
export function setTaskValue(model: FitModel, task: Vector, dimension: number | string, value: number): Vector {
  const index = dimensionIndex(model, dimension);
  assertOnScaleGrid(model.scale, value, model.dimensions[index].name);
  const next = task.slice();
  next[index] = value;
  return Object.freeze(next);
}

export function evaluateTask(
  model: FitModel,
  task: Vector,
  orientation: RadarOrientation = DEFAULT_ORIENTATION,
): FitEvaluation {
  validateTaskVector(model, task);
  const results = rankScores(scoreProfiles(model, task));
  return {
    task,
    results,
    best: bestFit(results),
    polygons: buildRadarPolygons(model, task, orientation),
  };
}

// Slider state for one user. Tied to the model it was started on; a different model starts over.
export type TaskSession = Readonly<{ modelId: string; task: Vector }>;

export function startTaskSession(model: FitModel): TaskSession {
  return { modelId: model.id, task: createTaskVector(model) };
}

export function sessionTask(session: TaskSession, model: FitModel, fresh: Vector = createTaskVector(model)): Vector {
  return session.modelId === model.id ? session.task : fresh;
}

/** Pull raw slider input onto the scale grid, warning when it had to move. */
export function snapTaskValue(model: FitModel, value: number): number {
  const next = clampToScale(model.scale, value);
  if (next !== value) {
    console.warn(`[fit-session] ${value} is not a step of [${model.scale.min}, ${model.scale.max}], using ${next}`);
  }
  return next;
}

export function updateTaskSession(
  session: TaskSession,
  model: FitModel,
  dimension: number | string,
  value: number,
): TaskSession {
  return { modelId: model.id, task: setTaskValue(model, sessionTask(session, model), dimension, value) };
}

