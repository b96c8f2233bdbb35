// data/presets/index.ts
import type { FitModel } from '../../types';
import { buildFitModel } from '../../lib/fit/config';
import standard from './standard.json';
import widened from './widened.json';
import compact from './compact.json';

export const DEFAULT_PRESET_ID = 'standard';

// Built eagerly: a broken preset should fail at startup, not on first use.
export const PRESETS: readonly FitModel[] = Object.freeze([standard, widened, compact].map(buildFitModel));

const presetMap: Map<string, FitModel> = new Map(PRESETS.map(p => [p.id, p]));

export function getPreset(id: string | null | undefined): FitModel {
  const hit = id ? presetMap.get(id) : undefined;
  if (hit) return hit;
  if (id) console.warn(`[presets] unknown preset "${id}", falling back to "${DEFAULT_PRESET_ID}"`);
  const fallback = presetMap.get(DEFAULT_PRESET_ID);
  if (!fallback) throw new Error(`Default preset "${DEFAULT_PRESET_ID}" is not registered`);
  return fallback;
}
