// lib/fit/score.ts
import { ScoringMode } from '../../enums';
import type { FitModel, ScoringContext, Vector } from '../../types';
import { ShapeError } from './errors';
import { scaleWidth } from './scale';

export function scoringContext(model: Pick<FitModel, 'scale' | 'dimensions' | 'scoring'>): ScoringContext {
  return {
    scale: model.scale,
    dimensionCount: model.dimensions.length,
    mode: model.scoring.mode,
    linearConstant: model.scoring.linearConstant,
  };
}

export function totalDifference(a: Vector, b: Vector): number {
  if (a.length !== b.length) {
    throw new ShapeError(`Cannot compare vectors of length ${a.length} and ${b.length}`);
  }
  let d = 0;
  for (let i = 0; i < a.length; i++) d += Math.abs(a[i] - b[i]);
  return d;
}

/**
 * Similarity between a task vector and a profile vector.
 *
 * normalized_percent: 100 - D / maxDiff * 100 in [0, 100], with a collapsed scale
 * (or no dimensions) counting as a perfect match.
 * linear_unbounded: dimensionCount * linearConstant - D, unclamped.
 */
export function fitScore(task: Vector, profile: Vector, ctx: ScoringContext): number {
  if (task.length !== ctx.dimensionCount || profile.length !== ctx.dimensionCount) {
    throw new ShapeError(
      `fitScore expects ${ctx.dimensionCount} values, got task=${task.length} profile=${profile.length}`,
    );
  }
  const d = totalDifference(task, profile);

  if (ctx.mode === ScoringMode.LinearUnbounded) {
    const constant = ctx.linearConstant ?? scaleWidth(ctx.scale);
    return ctx.dimensionCount * constant - d;
  }

  const maxDiff = scaleWidth(ctx.scale) * ctx.dimensionCount;
  if (maxDiff === 0) return 100;
  return Math.max(0, 100 - (d / maxDiff) * 100);
}

/** Score the task against every profile, in registry order. */
export function scoreProfiles(model: FitModel, task: Vector): Map<string, number> {
  const ctx = scoringContext(model);
  const scores = new Map<string, number>();
  for (const profile of model.profiles.values()) {
    scores.set(profile.name, fitScore(task, profile.values, ctx));
  }
  return scores;
}
