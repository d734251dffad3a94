/**
 * markov-backoff - weighted Markov chains over arbitrary symbols
 *
 * Trains fixed-order chains (optionally backing off to shorter contexts)
 * with integer weights and generates sequences by random walks.
 */

// Markov chains
export * from './markov/index.js';

// Random sources
export {
  PseudoRandomSource,
  CryptoRandomSource,
  createRandomSource,
  type ByteSource,
  type RandomSource,
  type RandomSourceKind,
  type RandomSourceOptions,
} from './random/index.js';

// Config
export {
  configSchema,
  parseConfig,
  getDefaultConfig,
  type Config,
} from './config/index.js';
