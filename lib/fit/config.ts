// lib/fit/config.ts
// Authored presets arrive as plain JSON. Everything here runs once per preset at module load;
// the resulting FitModel is frozen and safe to share between sessions.

import { z } from 'zod';
import { ScoringMode } from '../../enums';
import type { Dimension, FitModel } from '../../types';
import { FitConfigError } from './errors';
import { buildProfileRegistry } from './profiles';

const DEFAULT_COPY = { low: 'Low', high: 'High' } as const;

const ScaleSchema = z
  .object({
    min: z.number().int(),
    max: z.number().int(),
    step: z.number().int().positive().default(1),
  })
  .strict();

const SourceScaleSchema = z
  .object({
    min: z.number().int(),
    max: z.number().int(),
  })
  .strict();

const DimensionSchema = z
  .object({
    name: z.string().min(1),
    question: z.string().min(1).optional(),
    low: z.string().min(1).optional(),
    high: z.string().min(1).optional(),
  })
  .strict();

const RawProfileSchema = z
  .object({
    name: z.string().min(1),
    raw: z.array(z.number().int()),
  })
  .strict();

// Empty dimension/profile lists pass the schema on purpose: they are shape problems
// and buildProfileRegistry reports them as ShapeError.
export const FitConfigSchema = z
  .object({
    id: z.string().min(1),
    label: z.string().min(1),
    description: z.string().default(''),
    scale: ScaleSchema,
    scoring: z
      .object({
        mode: z.nativeEnum(ScoringMode),
        linearConstant: z.number().finite().optional(),
      })
      .strict(),
    dimensions: z.array(DimensionSchema),
    profiles: z
      .object({
        sourceScale: SourceScaleSchema.optional(),
        entries: z.array(RawProfileSchema),
      })
      .strict(),
  })
  .strict()
  .superRefine((cfg, ctx) => {
    if (cfg.scale.min > cfg.scale.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['scale'], message: 'min must not exceed max' });
    } else if ((cfg.scale.max - cfg.scale.min) % cfg.scale.step !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['scale', 'step'],
        message: `step ${cfg.scale.step} does not divide [${cfg.scale.min}, ${cfg.scale.max}]`,
      });
    }
    if (cfg.scoring.mode !== ScoringMode.LinearUnbounded && cfg.scoring.linearConstant !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['scoring', 'linearConstant'],
        message: `only applies to ${ScoringMode.LinearUnbounded} scoring`,
      });
    }
    const seen = new Set<string>();
    cfg.dimensions.forEach((d, i) => {
      if (seen.has(d.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dimensions', i, 'name'], message: `duplicate dimension "${d.name}"` });
      }
      seen.add(d.name);
    });
  });

export type FitConfigInput = z.input<typeof FitConfigSchema>;
export type FitConfig = z.output<typeof FitConfigSchema>;

function configIdOf(input: unknown): string {
  if (input != null && typeof input === 'object' && 'id' in input && typeof input.id === 'string') {
    return input.id;
  }
  return '<unknown>';
}

export function parseFitConfig(input: unknown): FitConfig {
  const res = FitConfigSchema.safeParse(input);
  if (!res.success) {
    const issues = res.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new FitConfigError(configIdOf(input), issues);
  }
  return res.data;
}

function resolveDimension(configId: string, d: FitConfig['dimensions'][number]): Dimension {
  if (!d.question || !d.low || !d.high) {
    console.warn(`[fit-config] ${configId}: dimension "${d.name}" is missing slider copy, using defaults`);
  }
  return Object.freeze({
    name: d.name,
    question: d.question ?? d.name,
    low: d.low ?? DEFAULT_COPY.low,
    high: d.high ?? DEFAULT_COPY.high,
  });
}

/**
 * Validate an authored preset and build its immutable model.
 * Throws FitConfigError for schema problems, ShapeError / ScaleRangeError for
 * profiles that don't fit the dimensions or the source scale.
 */
export function buildFitModel(input: unknown): FitModel {
  const cfg = parseFitConfig(input);
  const dimensions = Object.freeze(cfg.dimensions.map(d => resolveDimension(cfg.id, d)));
  const scale = Object.freeze({ ...cfg.scale });
  const profiles = buildProfileRegistry(cfg.profiles.entries, dimensions, cfg.profiles.sourceScale, scale);

  return Object.freeze({
    id: cfg.id,
    label: cfg.label,
    description: cfg.description,
    dimensions,
    scale,
    profiles,
    scoring: Object.freeze({ ...cfg.scoring }),
  });
}
