/**
 * Tests for the immutable state set.
 */

import { describe, it, expect } from 'vitest';
import { defineState } from '../../src/core/state.js';
import { StateSet } from '../../src/core/state-set.js';

const a = defineState({ id: 'a', name: 'Alpha' });
const b = defineState({ id: 'b', name: 'Beta' });
const c = defineState({ id: 'c', name: 'Gamma' });

describe('StateSet', () => {
  it('should compare members by id', () => {
    const copy = defineState({ id: 'a', name: 'Other alpha' });
    const set = StateSet.of(a, b);

    expect(set.has(copy)).toBe(true);
    expect(set.has('b')).toBe(true);
    expect(set.has('c')).toBe(false);
    expect(StateSet.of(a, copy).size).toBe(1);
  });

  it('should return the same instance from from() when given a set', () => {
    const set = StateSet.of(a);
    expect(StateSet.from(set)).toBe(set);
  });

  it('should not change when combined with other sets', () => {
    const set = StateSet.of(a, b);
    const union = set.union([c]);
    const difference = set.difference([a]);

    expect(set.ids()).toEqual(['a', 'b']);
    expect(union.ids()).toEqual(['a', 'b', 'c']);
    expect(difference.ids()).toEqual(['b']);
  });

  it('should intersect and test overlap', () => {
    const left = StateSet.of(a, b);
    const right = StateSet.of(b, c);

    expect(left.intersection(right).ids()).toEqual(['b']);
    expect(left.intersects(right)).toBe(true);
    expect(left.intersects([c])).toBe(false);
  });

  it('should check subsets and equality regardless of order', () => {
    expect(StateSet.of(a).isSubsetOf(StateSet.of(b, a))).toBe(true);
    expect(StateSet.of(a, c).isSubsetOf(StateSet.of(a, b))).toBe(false);
    expect(StateSet.of(a, b).equals(StateSet.of(b, a))).toBe(true);
    expect(StateSet.empty.isSubsetOf(StateSet.empty)).toBe(true);
  });

  it('should build an order-independent key', () => {
    expect(StateSet.of(b, a).key()).toBe('["a","b"]');
    expect(StateSet.of(a, b).key()).toBe(StateSet.of(b, a).key());
    expect(StateSet.empty.key()).toBe('[]');
  });

  it('should render member names', () => {
    expect(StateSet.of(a, c).toString()).toBe('[Alpha, Gamma]');
    expect(StateSet.empty.toString()).toBe('[]');
  });

  it('should look up members by id', () => {
    const set = StateSet.of(a, b);
    expect(set.get('b')).toBe(b);
    expect(set.get('c')).toBeUndefined();
    expect(Array.from(set).map((s) => s.name)).toEqual(['Alpha', 'Beta']);
  });
});
