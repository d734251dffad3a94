/**
 * Random number source consumed by chain generation
 */

export interface RandomSource {
  /**
   * Uniform integer in [0, maxValue). `next(0)` returns 0.
   */
  next(maxValue: number): number;
}

export type RandomSourceKind = 'pseudo' | 'crypto';

export interface RandomSourceOptions {
  kind?: RandomSourceKind;
  /** Only used by the pseudo-random source */
  seed?: number;
}

export function assertMaxValue(maxValue: number, limit: number): void {
  if (!Number.isInteger(maxValue) || maxValue < 0) {
    throw new RangeError(`maxValue must be a non-negative integer, got ${maxValue}`);
  }
  if (maxValue > limit) {
    throw new RangeError(`maxValue must not exceed ${limit}, got ${maxValue}`);
  }
}
