/**
 * Random sources for chain generation
 */

export type { RandomSource, RandomSourceKind, RandomSourceOptions } from './types.js';
export { PseudoRandomSource } from './pseudo.js';
export { CryptoRandomSource, type ByteSource } from './crypto.js';
export { createRandomSource } from './factory.js';
