/**
 * Markov chain that backs off to shorter contexts when a longer one has
 * too few distinct successors
 */

import { OrderedSet } from 'immutable';
import { createRandomSource } from '../random/factory.js';
import type { RandomSource } from '../random/types.js';
import { assertWeight, MarkovChain } from './chain.js';
import { ChainState } from './chain-state.js';
import type { ChainSymbol, Weights, WeightedChain } from './types.js';
import { startWalk } from './walk.js';

/**
 * Holds one MarkovChain per order from `maximumOrder` down to 1 and trains
 * all of them together. Reads answer from the highest order whose successor
 * set has at least `desiredNumNextStates` entries; order 1 is always accepted.
 */
export class MarkovChainWithBackoff<T extends ChainSymbol> implements WeightedChain<T> {
  // Highest order first
  private readonly chains: MarkovChain<T>[] = [];

  constructor(
    readonly maximumOrder: number,
    readonly desiredNumNextStates: number
  ) {
    if (!Number.isInteger(maximumOrder) || maximumOrder < 1) {
      throw new RangeError(`maximumOrder must be an integer of at least 1, got ${maximumOrder}`);
    }
    if (!Number.isInteger(desiredNumNextStates) || desiredNumNextStates < 0) {
      throw new RangeError(`desiredNumNextStates must be a non-negative integer, got ${desiredNumNextStates}`);
    }

    for (let order = maximumOrder; order > 0; order--) {
      this.chains.push(new MarkovChain<T>(order));
    }
  }

  get order(): number {
    return this.maximumOrder;
  }

  /**
   * The sub-chain of the given order, if it exists
   */
  getChain(order: number): MarkovChain<T> | undefined {
    return this.chains.find(chain => chain.order === order);
  }

  add(items: Iterable<T>, weight = 1): void {
    if (items == null) {
      throw new TypeError('items must not be null or undefined');
    }
    assertWeight(weight);

    // Materialize once so a one-shot iterable trains every order
    const sequence = Array.from(items);
    for (const chain of this.chains) {
      chain.add(sequence, weight);
    }
  }

  addTransition(previous: Iterable<T>, next: T, weight = 1): void {
    const state = this.toState(previous);
    assertWeight(weight);
    for (const chain of this.chains) {
      chain.addTransition(state, next, weight);
    }
  }

  addTerminal(previous: Iterable<T>, weight = 1): void {
    const state = this.toState(previous);
    assertWeight(weight);
    for (const chain of this.chains) {
      chain.addTerminal(state, weight);
    }
  }

  /**
   * Highest order that has successors for `previous` and enough of them,
   * falling back to 1. An order with no successors is always skipped.
   */
  getDesiredOrderTarget(previous: Iterable<T>): number {
    const state = this.toState(previous);

    for (const chain of this.chains) {
      if (chain.order === 1) {
        return 1;
      }
      const next = chain.getNextStates(state);
      if (next && next.size >= this.desiredNumNextStates) {
        return chain.order;
      }
    }

    return 1;
  }

  getInitialStates(): Weights<T> | undefined {
    return this.getNextStates([]);
  }

  getNextStates(previous: Iterable<T>): Weights<T> | undefined {
    const state = this.toState(previous);
    return this.chainFor(state).getNextStates(state);
  }

  getTerminalWeight(previous: Iterable<T>): number {
    const state = this.toState(previous);
    return this.chainFor(state).getTerminalWeight(state);
  }

  *getStates(): IterableIterator<ChainState<T>> {
    let seen = OrderedSet<ChainState<T>>();

    for (const chain of this.chains) {
      for (const state of chain.getStates()) {
        if (!seen.has(state)) {
          seen = seen.add(state);
          yield state;
        }
      }
    }
  }

  chain(
    previous: Iterable<T> = [],
    random: RandomSource = createRandomSource()
  ): Generator<T, void, undefined> {
    return startWalk(this, previous, random);
  }

  private chainFor(state: ChainState<T>): MarkovChain<T> {
    const order = this.getDesiredOrderTarget(state);
    const chain = this.getChain(order);
    if (!chain) {
      throw new Error(`No chain of order ${order}`);
    }
    return chain;
  }

  private toState(previous: Iterable<T>): ChainState<T> {
    if (previous == null) {
      throw new TypeError('previous must not be null or undefined');
    }
    return ChainState.from(previous).truncate(this.maximumOrder);
  }
}
