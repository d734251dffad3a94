/**
 * Type definitions for the Markov chain engine
 */

import type { ValueObject } from 'immutable';
import type { ChainState } from './chain-state.js';
import type { RandomSource } from '../random/types.js';

/**
 * A symbol that carries its own equality and hash.
 * Object symbols without these would only compare by reference.
 */
export type HashableSymbol = ValueObject;

/**
 * Anything a chain can be trained on
 */
export type ChainSymbol = string | number | boolean | bigint | HashableSymbol;

/**
 * Successor weights for one context, in insertion order
 */
export type Weights<T> = Map<T, number>;

/**
 * One step of a random walk
 */
export interface WalkStep<T extends ChainSymbol> {
  symbol: T;
  state: ChainState<T>;
}

/**
 * Capability shared by the fixed-order chain and the backoff composite.
 * The walk only ever talks to this interface.
 */
export interface WeightedChain<T extends ChainSymbol> {
  /** Longest context window this chain looks at */
  readonly order: number;

  add(items: Iterable<T>, weight?: number): void;
  addTransition(previous: Iterable<T>, next: T, weight?: number): void;
  addTerminal(previous: Iterable<T>, weight?: number): void;

  getInitialStates(): Weights<T> | undefined;
  getNextStates(previous: Iterable<T>): Weights<T> | undefined;
  getTerminalWeight(previous: Iterable<T>): number;
  getStates(): IterableIterator<ChainState<T>>;

  chain(previous?: Iterable<T>, random?: RandomSource): Generator<T, void, undefined>;
}
