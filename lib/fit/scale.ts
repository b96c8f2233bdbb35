// lib/fit/scale.ts
import type { Scale, SourceScale } from '../../types';
import { ScaleRangeError } from './errors';

/**
 * Round to the nearest integer, ties to the even neighbour (5.5 -> 6, 4.5 -> 4).
 */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Linear rescale of `value` from [srcMin, srcMax] onto [dstMin, dstMax], rounded half to even.
 * Only ever fed authored profile scores, so a bad input is a data bug and throws.
 */
export function mapToScale(
  value: number,
  srcMin: number,
  srcMax: number,
  dstMin: number,
  dstMax: number,
): number {
  if (![value, srcMin, srcMax, dstMin, dstMax].every(Number.isFinite)) {
    throw new ScaleRangeError(`mapToScale: non-finite input (${value} on [${srcMin}, ${srcMax}] -> [${dstMin}, ${dstMax}])`);
  }
  if (srcMin >= srcMax) {
    throw new ScaleRangeError(`mapToScale: source range [${srcMin}, ${srcMax}] has no width`);
  }
  if (value < srcMin || value > srcMax) {
    throw new ScaleRangeError(`mapToScale: ${value} is outside [${srcMin}, ${srcMax}]`);
  }
  const scaled = dstMin + ((value - srcMin) / (srcMax - srcMin)) * (dstMax - dstMin);
  return roundHalfEven(scaled);
}

export function scaleWidth(scale: SourceScale): number {
  return scale.max - scale.min;
}

export function isInScale(scale: SourceScale, value: number): boolean {
  return Number.isFinite(value) && value >= scale.min && value <= scale.max;
}

export function assertInScale(scale: SourceScale, value: number, what = 'value'): void {
  if (!isInScale(scale, value)) {
    throw new ScaleRangeError(`${what} ${value} is outside [${scale.min}, ${scale.max}]`);
  }
}

/** Values a slider can land on: min, min + step, ... up to max. */
export function isOnScaleGrid(scale: Scale, value: number): boolean {
  return isInScale(scale, value) && Number.isInteger((value - scale.min) / scale.step);
}

export function assertOnScaleGrid(scale: Scale, value: number, what = 'value'): void {
  assertInScale(scale, value, what);
  if (!isOnScaleGrid(scale, value)) {
    throw new ScaleRangeError(`${what} ${value} is not a step of [${scale.min}, ${scale.max}] by ${scale.step}`);
  }
}

// Snap onto the step grid anchored at scale.min; the result never leaves the grid.
export function clampToScale(scale: Scale, value: number): number {
  if (!Number.isFinite(value)) return scale.min;
  const lastStep = Math.max(0, Math.floor((scale.max - scale.min) / scale.step));
  const steps = Math.min(lastStep, Math.max(0, roundHalfEven((value - scale.min) / scale.step)));
  return scale.min + steps * scale.step;
}

/** Default slider position: the lower middle step (5 on [1,10], 3 on [1,5]). */
export function scaleMidpoint(scale: Scale): number {
  const steps = Math.floor((scale.max - scale.min) / scale.step / 2);
  return scale.min + steps * scale.step;
}

export function scaleTicks(scale: Scale): number[] {
  const ticks: number[] = [];
  for (let v = scale.min; v <= scale.max; v += scale.step) ticks.push(v);
  return ticks;
}
