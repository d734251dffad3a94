/**
 * Fast seedable pseudo-random source (mulberry32)
 */

import { assertMaxValue, type RandomSource } from './types.js';

const UINT32_RANGE = 0x100000000;

export class PseudoRandomSource implements RandomSource {
  private state: number;

  constructor(seed?: number) {
    if (seed !== undefined && !Number.isFinite(seed)) {
      throw new RangeError(`seed must be a finite number, got ${seed}`);
    }
    this.state = (seed ?? Math.floor(Math.random() * UINT32_RANGE)) >>> 0;
  }

  /**
   * Rejects words at or above the largest multiple of `maxValue` below 2^32,
   * so `word % maxValue` carries no modulo bias.
   */
  next(maxValue: number): number {
    assertMaxValue(maxValue, UINT32_RANGE);
    if (maxValue === 0) return 0;

    const chop = UINT32_RANGE - (UINT32_RANGE % maxValue);

    let word: number;
    do {
      word = this.nextUint32();
    } while (word >= chop);

    return word % maxValue;
  }

  /** 0 <= x < 1 */
  nextFloat(): number {
    return this.nextUint32() / UINT32_RANGE;
  }

  private nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1) >>> 0;
    t ^= (t + Math.imul(t ^ (t >>> 7), t | 61)) >>> 0;
    return (t ^ (t >>> 14)) >>> 0;
  }
}
