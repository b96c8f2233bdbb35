// types.ts
import { AngularDirection, ScoringMode, SeriesKind } from './enums';

export { AngularDirection, ScoringMode, SeriesKind };

// --- Scale & vectors ---
export interface Scale {
  min: number;
  max: number;
  step: number;
}

/** Source range of authored raw scores; no step, values are always integers. */
export type SourceScale = Pick<Scale, 'min' | 'max'>;

export type Vector = readonly number[];

// --- Model ---
export interface Dimension {
  name: string;
  question: string;
  low: string;
  high: string;
}

export interface Profile {
  name: string;
  values: Vector;
}

export type ProfileRegistry = ReadonlyMap<string, Profile>;

export interface RawProfile {
  name: string;
  raw: readonly number[];
}

export interface ScoringRule {
  mode: ScoringMode;
  // linear_unbounded only; defaults to the scale width
  linearConstant?: number;
}

export interface FitModel {
  id: string;
  label: string;
  description: string;
  dimensions: readonly Dimension[];
  scale: Scale;
  profiles: ProfileRegistry;
  scoring: ScoringRule;
}

export interface ScoringContext {
  scale: Scale;
  dimensionCount: number;
  mode: ScoringMode;
  linearConstant?: number;
}

// --- Derived outputs ---
export interface RankedFit {
  name: string;
  score: number;
  rank: number;
}

export interface RadarOrientation {
  direction: AngularDirection;
  /** Degrees added to every angle. */
  rotation: number;
}

export interface PolarPoint {
  dimension: string;
  /** Radians in [0, 2π). */
  angle: number;
  radius: number;
}

export interface RadarPolygon {
  name: string;
  kind: SeriesKind;
  points: PolarPoint[];
}

export interface FitEvaluation {
  task: Vector;
  results: RankedFit[];
  best: RankedFit;
  polygons: RadarPolygon[];
}

// --- Rendering ---
export interface SeriesStyle {
  color: string;
  fill: string;
  fillOpacity: number;
  strokeWidth: number;
  dash?: string;
}
