/**
 * Cryptographically strong random source.
 *
 * Draws 64-bit words and rejects those at or above the largest multiple of
 * `maxValue` that fits in a word, so `word % maxValue` carries no modulo bias.
 */

import { randomBytes as nodeRandomBytes } from 'node:crypto';
import { assertMaxValue, type RandomSource } from './types.js';

const UINT64_MAX = 0xffffffffffffffffn;
const WORD_BYTES = 8;

export type ByteSource = (size: number) => Uint8Array;

export class CryptoRandomSource implements RandomSource {
  constructor(private readonly randomBytes: ByteSource = nodeRandomBytes) {
    if (randomBytes == null) {
      throw new TypeError('randomBytes must not be null or undefined');
    }
  }

  next(maxValue: number): number {
    assertMaxValue(maxValue, Number.MAX_SAFE_INTEGER);
    if (maxValue === 0) return 0;

    const max = BigInt(maxValue);
    const chop = UINT64_MAX - (UINT64_MAX % max);

    let word: bigint;
    do {
      word = this.nextWord();
    } while (word >= chop);

    return Number(word % max);
  }

  private nextWord(): bigint {
    const bytes = this.randomBytes(WORD_BYTES);
    if (bytes.length < WORD_BYTES) {
      throw new Error(`Random byte source returned ${bytes.length} bytes, expected ${WORD_BYTES}`);
    }
    const view = new DataView(bytes.buffer, bytes.byteOffset, WORD_BYTES);
    return view.getBigUint64(0, true);
  }
}
