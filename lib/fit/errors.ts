// lib/fit/errors.ts

/** A value lies outside its declared scale, or a scale itself is unusable. */
export class ScaleRangeError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = 'ScaleRangeError';
  }
}

/** Vectors that should line up with the dimension list don't. */
export class ShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShapeError';
  }
}

export class FitConfigError extends Error {
  readonly issues: string[];

  constructor(configId: string, issues: string[]) {
    super(`Invalid fit config "${configId}": ${issues.join(' | ')}`);
    this.name = 'FitConfigError';
    this.issues = issues;
  }
}
