/**
 * Build chains and random sources from configuration
 */

import type { Config } from '../config/schema.js';
import { createRandomSource } from '../random/factory.js';
import type { RandomSource } from '../random/types.js';
import { MarkovChainWithBackoff } from './backoff.js';
import { MarkovChain } from './chain.js';
import type { ChainSymbol, WeightedChain } from './types.js';

export function createChainFromConfig<T extends ChainSymbol>(
  config: Pick<Config, 'chain' | 'backoff'>
): WeightedChain<T> {
  if (config.backoff.enabled) {
    return new MarkovChainWithBackoff<T>(
      config.backoff.maximumOrder,
      config.backoff.desiredNumNextStates
    );
  }
  return new MarkovChain<T>(config.chain.order);
}

export function createRandomSourceFromConfig(config: Pick<Config, 'random'>): RandomSource {
  return createRandomSource({
    kind: config.random.kind,
    seed: config.random.seed,
  });
}
