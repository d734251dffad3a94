/**
 * Fixed-order Markov chain with integer weights
 */

import { OrderedMap } from 'immutable';
import { createRandomSource } from '../random/factory.js';
import type { RandomSource } from '../random/types.js';
import { ChainState } from './chain-state.js';
import type { ChainSymbol, Weights, WeightedChain } from './types.js';
import { startWalk } from './walk.js';

export function assertWeight(weight: number): void {
  if (!Number.isInteger(weight)) {
    throw new RangeError(`weight must be an integer, got ${weight}`);
  }
}

/**
 * Markov chain of a fixed order. Every state is the window of at most
 * `order` most recent symbols; each state keeps weighted successors and
 * the weight of ending there.
 */
export class MarkovChain<T extends ChainSymbol> implements WeightedChain<T> {
  // Insertion order of successors decides which symbol a draw lands on
  private transitions = OrderedMap<ChainState<T>, OrderedMap<T, number>>();
  private terminals = OrderedMap<ChainState<T>, number>();

  constructor(private readonly chainOrder: number) {
    if (!Number.isInteger(chainOrder) || chainOrder < 0) {
      throw new RangeError(`order must be a non-negative integer, got ${chainOrder}`);
    }
  }

  get order(): number {
    return this.chainOrder;
  }

  /**
   * Train on one sequence. A negative weight removes what an equal positive
   * weight added.
   */
  add(items: Iterable<T>, weight = 1): void {
    if (items == null) {
      throw new TypeError('items must not be null or undefined');
    }
    assertWeight(weight);

    let state = ChainState.empty<T>();
    for (const item of items) {
      this.addToState(state, item, weight);
      state = state.push(item, this.chainOrder);
    }

    this.addTerminalToState(state, weight);
  }

  addTransition(previous: Iterable<T>, next: T, weight = 1): void {
    assertWeight(weight);
    this.addToState(this.toState(previous), next, weight);
  }

  addTerminal(previous: Iterable<T>, weight = 1): void {
    assertWeight(weight);
    this.addTerminalToState(this.toState(previous), weight);
  }

  getInitialStates(): Weights<T> | undefined {
    return this.getNextStates([]);
  }

  /**
   * Copy of the successor weights after `previous`, or undefined if never seen
   */
  getNextStates(previous: Iterable<T>): Weights<T> | undefined {
    const row = this.transitions.get(this.toState(previous));
    return row ? new Map(row.entries()) : undefined;
  }

  getTerminalWeight(previous: Iterable<T>): number {
    return this.terminals.get(this.toState(previous)) ?? 0;
  }

  *getStates(): IterableIterator<ChainState<T>> {
    yield* this.transitions.keys();

    for (const state of this.terminals.keys()) {
      if (!this.transitions.has(state)) {
        yield state;
      }
    }
  }

  chain(
    previous: Iterable<T> = [],
    random: RandomSource = createRandomSource()
  ): Generator<T, void, undefined> {
    return startWalk(this, previous, random);
  }

  private toState(previous: Iterable<T>): ChainState<T> {
    if (previous == null) {
      throw new TypeError('previous must not be null or undefined');
    }
    return ChainState.from(previous).truncate(this.chainOrder);
  }

  private addToState(state: ChainState<T>, next: T, weight: number): void {
    const row = this.transitions.get(state);
    const newWeight = Math.max(0, (row?.get(next) ?? 0) + weight);

    if (newWeight === 0) {
      if (!row) return;
      const remaining = row.delete(next);
      this.transitions = remaining.isEmpty()
        ? this.transitions.delete(state)
        : this.transitions.set(state, remaining);
      return;
    }

    this.transitions = this.transitions.set(state, (row ?? OrderedMap<T, number>()).set(next, newWeight));
  }

  private addTerminalToState(state: ChainState<T>, weight: number): void {
    const newWeight = Math.max(0, (this.terminals.get(state) ?? 0) + weight);

    this.terminals = newWeight === 0
      ? this.terminals.delete(state)
      : this.terminals.set(state, newWeight);
  }
}
