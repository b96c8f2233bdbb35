// lib/fit/profiles.ts
import type { Dimension, Profile, ProfileRegistry, RawProfile, Scale, SourceScale } from '../../types';
import { ScaleRangeError, ShapeError } from './errors';
import { RESERVED_SERIES_NAMES } from './radar';
import { assertInScale, mapToScale } from './scale';

// Without a source scale the raw scores are already canonical and only get range-checked.
function toCanonical(value: number, source: SourceScale | undefined, scale: Scale): number {
  if (!source) {
    assertInScale(scale, value, 'score');
    return value;
  }
  return mapToScale(value, source.min, source.max, scale.min, scale.max);
}

function mapProfile(raw: RawProfile, dimensions: readonly Dimension[], source: SourceScale | undefined, scale: Scale): Profile {
  if (raw.raw.length !== dimensions.length) {
    throw new ShapeError(
      `Profile "${raw.name}" has ${raw.raw.length} scores but there are ${dimensions.length} dimensions`,
    );
  }
  const values = raw.raw.map((v, i) => {
    try {
      return toCanonical(v, source, scale);
    } catch (e) {
      if (e instanceof ScaleRangeError) {
        throw new ScaleRangeError(`Profile "${raw.name}", dimension "${dimensions[i].name}": ${e.message}`);
      }
      throw e;
    }
  });
  return Object.freeze({ name: raw.name, values: Object.freeze(values) });
}

/**
 * Map every authored raw profile onto the canonical scale.
 * The result keeps the authored order, which is also the ranking tie-break order.
 */
export function buildProfileRegistry(
  rawProfiles: readonly RawProfile[],
  dimensions: readonly Dimension[],
  source: SourceScale | undefined,
  scale: Scale,
): ProfileRegistry {
  if (dimensions.length === 0) throw new ShapeError('Cannot build profiles without dimensions');
  if (rawProfiles.length === 0) throw new ShapeError('At least one reference profile is required');

  const registry = new Map<string, Profile>();
  for (const raw of rawProfiles) {
    if (registry.has(raw.name)) throw new ShapeError(`Duplicate profile name "${raw.name}"`);
    if (RESERVED_SERIES_NAMES.includes(raw.name)) {
      throw new ShapeError(`Profile name "${raw.name}" is reserved for the chart`);
    }
    registry.set(raw.name, mapProfile(raw, dimensions, source, scale));
  }
  return registry;
}
