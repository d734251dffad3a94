/**
 * Unit tests for ChainState
 */

import { describe, it, expect } from 'vitest';
import { hash } from 'immutable';
import { ChainState } from '../../../src/markov/chain-state.js';

const SAMPLES = ['a', 'ab', 'abc', 'aaa'];

const VALUE_PAIRS = SAMPLES.flatMap(v1 =>
  SAMPLES.filter(v2 => v2 !== v1).map((v2): [string, string] => [v1, v2])
);

class Word {
  constructor(readonly text: string) {}

  equals(other: unknown): boolean {
    return other instanceof Word && other.text === this.text;
  }

  hashCode(): number {
    return hash(this.text);
  }
}

describe('ChainState', () => {
  describe('constructor', () => {
    it('throws TypeError for a null source', () => {
      expect(() => new ChainState(null as unknown as Iterable<string>)).toThrow(TypeError);
    });

    it('throws TypeError for an undefined source', () => {
      expect(() => new ChainState(undefined as unknown as Iterable<string>)).toThrow(TypeError);
    });

    it('copies the source items', () => {
      const source = ['a', 'b'];
      const state = new ChainState(source);
      source.push('c');

      expect(state.toArray()).toEqual(['a', 'b']);
      expect(state.length).toBe(2);
    });

    it('accepts any iterable', () => {
      function* letters() {
        yield 'x';
        yield 'y';
      }

      expect(new ChainState(letters()).toArray()).toEqual(['x', 'y']);
      expect(new ChainState('xy').toArray()).toEqual(['x', 'y']);
    });
  });

  describe('equals', () => {
    it.each(VALUE_PAIRS)('%s differs from %s', (value1, value2) => {
      const a = new ChainState(value1);
      const b = new ChainState(value2);

      expect(a.equals(b)).toBe(false);
    });

    it.each(SAMPLES)('%s equals a separately built state of the same value', value => {
      const a = new ChainState(value);
      const b = new ChainState(value);

      expect(a.equals(b)).toBe(true);
      expect(a.hashCode()).toBe(b.hashCode());
    });

    it.each(SAMPLES)('%s is not equal to null or undefined', value => {
      const a = new ChainState(value);

      expect(a.equals(null)).toBe(false);
      expect(a.equals(undefined)).toBe(false);
    });

    it.each(SAMPLES)('%s equals the same reference', value => {
      const a = new ChainState(value);

      expect(a.equals(a)).toBe(true);
    });

    it('is order sensitive', () => {
      const ab = new ChainState('ab');
      const ba = new ChainState('ba');

      expect(ab.equals(ba)).toBe(false);
      expect(ab.hashCode()).not.toBe(ba.hashCode());
    });

    it('distinguishes symbols of different primitive types', () => {
      const numeric = new ChainState<string | number>([1]);
      const text = new ChainState<string | number>(['1']);

      expect(numeric.equals(text)).toBe(false);
      expect(numeric.hashCode()).not.toBe(text.hashCode());
    });

    it('treats NaN as equal to itself', () => {
      const a = new ChainState([Number.NaN]);
      const b = new ChainState([Number.NaN]);

      expect(a.equals(b)).toBe(true);
      expect(a.hashCode()).toBe(b.hashCode());
    });

    it('uses equals and hashCode of object symbols', () => {
      const a = new ChainState([new Word('hello'), new Word('world')]);
      const b = new ChainState([new Word('hello'), new Word('world')]);

      expect(a.equals(b)).toBe(true);
      expect(a.hashCode()).toBe(b.hashCode());
    });
  });

  describe('truncate', () => {
    it('keeps the most recent symbols', () => {
      expect(new ChainState('abcd').truncate(2).toArray()).toEqual(['c', 'd']);
    });

    it('returns the same state when already short enough', () => {
      const state = new ChainState('ab');

      expect(state.truncate(2)).toBe(state);
      expect(state.truncate(5)).toBe(state);
    });

    it('truncates to the empty state at order 0', () => {
      expect(new ChainState('abc').truncate(0).length).toBe(0);
    });

    it('rejects a negative order', () => {
      expect(() => new ChainState('abc').truncate(-1)).toThrow(RangeError);
    });
  });

  describe('push', () => {
    it('returns a new state and leaves the original untouched', () => {
      const state = new ChainState('ab');
      const next = state.push('c', 3);

      expect(next.toArray()).toEqual(['a', 'b', 'c']);
      expect(state.toArray()).toEqual(['a', 'b']);
    });

    it('drops the oldest symbol once the order is exceeded', () => {
      expect(new ChainState('ab').push('c', 2).toArray()).toEqual(['b', 'c']);
    });
  });

  describe('from', () => {
    it('reuses an existing state', () => {
      const state = new ChainState('ab');

      expect(ChainState.from(state)).toBe(state);
    });

    it('wraps a plain iterable', () => {
      expect(ChainState.from(['a']).equals(new ChainState('a'))).toBe(true);
    });
  });

  it('exposes items by index', () => {
    const state = new ChainState('abc');

    expect(state.at(0)).toBe('a');
    expect(state.at(-1)).toBe('c');
    expect(state.at(5)).toBeUndefined();
    expect([...state]).toEqual(['a', 'b', 'c']);
  });
});
