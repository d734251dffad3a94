/**
 * Immutable context window identifying a position in the chain
 */

import { List, type ValueObject } from 'immutable';
import type { ChainSymbol } from './types.js';

/**
 * A ValueObject, so immutable collections key by the symbols it holds
 * rather than by reference.
 */
export class ChainState<T extends ChainSymbol> implements Iterable<T>, ValueObject {
  private readonly items: List<T>;

  constructor(items: Iterable<T>) {
    if (items == null) {
      throw new TypeError('ChainState items must not be null or undefined');
    }
    this.items = List(items);
  }

  static empty<T extends ChainSymbol>(): ChainState<T> {
    return new ChainState<T>(List<T>());
  }

  /**
   * Accept either an existing state or a plain iterable of symbols
   */
  static from<T extends ChainSymbol>(items: Iterable<T>): ChainState<T> {
    return items instanceof ChainState ? items : new ChainState(items);
  }

  get length(): number {
    return this.items.size;
  }

  at(index: number): T | undefined {
    return this.items.get(index);
  }

  toArray(): T[] {
    return this.items.toArray();
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  /**
   * The last `order` symbols of this state
   */
  truncate(order: number): ChainState<T> {
    if (!Number.isInteger(order) || order < 0) {
      throw new RangeError(`order must be a non-negative integer, got ${order}`);
    }
    if (this.items.size <= order) {
      return this;
    }
    return new ChainState(order === 0 ? List<T>() : this.items.takeLast(order));
  }

  /**
   * A new state with `item` appended, keeping at most `order` symbols
   */
  push(item: T, order: number): ChainState<T> {
    return new ChainState(this.items.push(item)).truncate(order);
  }

  equals(other: unknown): boolean {
    if (other === this) return true;
    return other instanceof ChainState && this.items.equals(other.items);
  }

  hashCode(): number {
    return this.items.hashCode();
  }
}
