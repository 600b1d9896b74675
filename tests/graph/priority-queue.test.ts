/**
 * Tests for the binary heap.
 */

import { describe, it, expect } from 'vitest';
import { PriorityQueue } from '../../src/graph/priority-queue.js';

describe('PriorityQueue', () => {
  it('should pop items in ascending order', () => {
    const queue = new PriorityQueue<number>((a, b) => a - b);
    for (const value of [5, 1, 4, 1, 3, 9, 2]) queue.push(value);

    const popped: number[] = [];
    for (let value = queue.pop(); value !== undefined; value = queue.pop()) {
      popped.push(value);
    }
    expect(popped).toEqual([1, 1, 2, 3, 4, 5, 9]);
  });

  it('should report size and peek without removing', () => {
    const queue = new PriorityQueue<string>((a, b) => a.localeCompare(b));
    expect(queue.isEmpty()).toBe(true);
    expect(queue.pop()).toBeUndefined();

    queue.push('b');
    queue.push('a');
    expect(queue.peek()).toBe('a');
    expect(queue.size).toBe(2);
  });

  it('should break ties with a secondary key', () => {
    const queue = new PriorityQueue<{ priority: number; sequence: number }>(
      (a, b) => a.priority - b.priority || a.sequence - b.sequence
    );
    queue.push({ priority: 1, sequence: 2 });
    queue.push({ priority: 1, sequence: 0 });
    queue.push({ priority: 0, sequence: 3 });
    queue.push({ priority: 1, sequence: 1 });

    expect([queue.pop(), queue.pop(), queue.pop(), queue.pop()].map((e) => e?.sequence)).toEqual([
      3, 0, 1, 2,
    ]);
  });
});
