/**
 * Markov chain engine: fixed-order chains, backoff composite, random walks
 */

// Type exports
export type {
  HashableSymbol,
  ChainSymbol,
  Weights,
  WalkStep,
  WeightedChain,
} from './types.js';

export { ChainState } from './chain-state.js';

// Chains
export { MarkovChain } from './chain.js';
export { MarkovChainWithBackoff } from './backoff.js';

// Generation
export { step, walk } from './walk.js';

export { createChainFromConfig, createRandomSourceFromConfig } from './factory.js';
