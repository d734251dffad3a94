import { describe, it, expect } from 'vitest';
import { createChainFromConfig, createRandomSourceFromConfig } from '../../../src/markov/factory.js';
import { MarkovChain } from '../../../src/markov/chain.js';
import { MarkovChainWithBackoff } from '../../../src/markov/backoff.js';
import { PseudoRandomSource } from '../../../src/random/pseudo.js';
import { CryptoRandomSource } from '../../../src/random/crypto.js';
import { configSchema, getDefaultConfig } from '../../../src/config/index.js';

describe('createChainFromConfig', () => {
  it('builds a fixed-order chain by default', () => {
    const chain = createChainFromConfig<string>(getDefaultConfig());

    expect(chain).toBeInstanceOf(MarkovChain);
    expect(chain.order).toBe(2);
  });

  it('builds a backoff chain when enabled', () => {
    const config = configSchema.parse({ backoff: { enabled: true, maximumOrder: 4, desiredNumNextStates: 3 } });

    const chain = createChainFromConfig<string>(config);

    expect(chain).toBeInstanceOf(MarkovChainWithBackoff);
    expect(chain.order).toBe(4);
    if (chain instanceof MarkovChainWithBackoff) {
      expect(chain.desiredNumNextStates).toBe(3);
    }
  });

  it('returns a chain that trains and generates', () => {
    const config = configSchema.parse({ chain: { order: 1 }, random: { seed: 5 } });
    const chain = createChainFromConfig<string>(config);

    chain.add('xyz');

    expect([...chain.chain([], createRandomSourceFromConfig(config))].join('')).toBe('xyz');
  });
});

describe('createRandomSourceFromConfig', () => {
  it('seeds the pseudo-random source', () => {
    const source = createRandomSourceFromConfig(configSchema.parse({ random: { seed: 42 } }));
    const expected = new PseudoRandomSource(42);

    expect(source).toBeInstanceOf(PseudoRandomSource);
    expect(source.next(1000)).toBe(expected.next(1000));
  });

  it('builds the crypto source', () => {
    const source = createRandomSourceFromConfig(configSchema.parse({ random: { kind: 'crypto' } }));

    expect(source).toBeInstanceOf(CryptoRandomSource);
  });
});
