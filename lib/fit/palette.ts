// lib/fit/palette.ts
import type { SeriesStyle } from '../../types';

const PROFILE_STYLES: Record<string, SeriesStyle> = {
  Human: { color: '#1f77b4', fill: '#1f77b4', fillOpacity: 0.08, strokeWidth: 1.4, dash: '6 4' },
  System: { color: '#ff7f0e', fill: '#ff7f0e', fillOpacity: 0.08, strokeWidth: 1.4, dash: '6 4' },
  AI: { color: '#2ca02c', fill: '#2ca02c', fillOpacity: 0.08, strokeWidth: 1.4, dash: '6 4' },
};

export const DEFAULT_PROFILE_STYLE: SeriesStyle = {
  color: '#6c757d',
  fill: '#000000',
  fillOpacity: 0.05,
  strokeWidth: 1.4,
  dash: '6 4',
};

export const TASK_STYLE: SeriesStyle = {
  color: '#111111',
  fill: '#111111',
  fillOpacity: 0.12,
  strokeWidth: 2.2,
};

export function seriesStyleFor(profileName: string): SeriesStyle {
  return PROFILE_STYLES[profileName] ?? DEFAULT_PROFILE_STYLE;
}
