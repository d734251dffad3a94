/**
 * Explicit construction of a random source; there is no shared default instance
 */

import type { RandomSource, RandomSourceOptions } from './types.js';
import { PseudoRandomSource } from './pseudo.js';
import { CryptoRandomSource } from './crypto.js';

export function createRandomSource(options: RandomSourceOptions = {}): RandomSource {
  const kind = options.kind ?? 'pseudo';
  switch (kind) {
    case 'pseudo':
      return new PseudoRandomSource(options.seed);
    case 'crypto':
      return new CryptoRandomSource();
  }
}
