/**
 * Weighted random walk over any WeightedChain
 */

import type { RandomSource } from '../random/types.js';
import { ChainState } from './chain-state.js';
import type { ChainSymbol, WalkStep, WeightedChain } from './types.js';

/**
 * Take one step from `state`: a single weighted draw over the successors and
 * the terminal weight. Returns null when the walk ends, either because the
 * context is unknown or because termination was drawn.
 */
export function step<T extends ChainSymbol>(
  source: WeightedChain<T>,
  state: ChainState<T>,
  random: RandomSource
): WalkStep<T> | null {
  const key = state.truncate(source.order);

  // Successors first, terminal second; the backoff composite selects its order per call
  const weights = source.getNextStates(key);
  if (!weights) {
    return null;
  }
  const terminalWeight = source.getTerminalWeight(key);

  let total = 0;
  for (const weight of weights.values()) {
    total += weight;
  }

  const value = random.next(total + terminalWeight) + 1;
  if (value > total) {
    return null;
  }

  let currentWeight = 0;
  for (const [symbol, weight] of weights) {
    currentWeight += weight;
    if (currentWeight >= value) {
      return { symbol, state: key.push(symbol, source.order) };
    }
  }

  return null;
}

/**
 * Lazily emit symbols until the walk ends. Abandoning the iterator is safe.
 */
export function* walk<T extends ChainSymbol>(
  source: WeightedChain<T>,
  previous: ChainState<T>,
  random: RandomSource
): Generator<T, void, undefined> {
  let state = previous;
  while (true) {
    const next = step(source, state, random);
    if (!next) {
      return;
    }
    yield next.symbol;
    state = next.state;
  }
}

/**
 * Eager argument checks for the public chain() entry points
 */
export function startWalk<T extends ChainSymbol>(
  source: WeightedChain<T>,
  previous: Iterable<T>,
  random: RandomSource
): Generator<T, void, undefined> {
  if (previous == null) {
    throw new TypeError('previous must not be null or undefined');
  }
  if (random == null) {
    throw new TypeError('random must not be null or undefined');
  }
  return walk(source, ChainState.from(previous), random);
}
