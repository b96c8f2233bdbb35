// lib/fit/ranking.ts
import { ScoringMode } from '../../enums';
import type { RankedFit } from '../../types';
import { ShapeError } from './errors';
import { roundHalfEven } from './scale';

export type ScoreTable = ReadonlyMap<string, number> | Readonly<Record<string, number>>;

function isScoreMap(scores: ScoreTable): scores is ReadonlyMap<string, number> {
  return scores instanceof Map;
}

function entriesOf(scores: ScoreTable): Array<[string, number]> {
  if (isScoreMap(scores)) return Array.from(scores.entries());
  return Object.entries(scores);
}

/** Highest score first; equal scores keep their insertion order. */
export function rankScores(scores: ScoreTable): RankedFit[] {
  return entriesOf(scores)
    .map(([name, score], orderIndex) => ({ name, score, orderIndex }))
    .sort((left, right) => {
      const scoreDiff = right.score - left.score;
      if (scoreDiff !== 0) return scoreDiff;
      return left.orderIndex - right.orderIndex;
    })
    .map((item, index) => ({ name: item.name, score: item.score, rank: index + 1 }));
}

export function bestFit(ranked: readonly RankedFit[]): RankedFit {
  const first = ranked[0];
  if (!first) throw new ShapeError('No profiles to pick a best fit from');
  return first;
}

export function formatScore(score: number, mode: ScoringMode = ScoringMode.NormalizedPercent): string {
  const rounded = roundHalfEven(score);
  return mode === ScoringMode.NormalizedPercent ? `${rounded}%` : String(rounded);
}

export function bestFitHeadline(best: RankedFit, mode: ScoringMode = ScoringMode.NormalizedPercent): string {
  return `Best fit: ${best.name} (${formatScore(best.score, mode)})`;
}
