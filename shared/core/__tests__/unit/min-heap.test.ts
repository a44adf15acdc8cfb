import { describe, it, expect } from '@jest/globals';

import { MinHeap } from '@pipeline/core';

describe('MinHeap', () => {
  it('should pop in ascending order', () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    [5, 1, 4, 2, 3].forEach(n => heap.push(n));

    expect(heap.size).toBe(5);
    expect(heap.peek()).toBe(1);
    expect(heap.extractAll()).toEqual([1, 2, 3, 4, 5]);
    expect(heap.isEmpty).toBe(true);
  });

  it('should remove an arbitrary element and keep heap order', () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    [7, 3, 9, 1, 5].forEach(n => heap.push(n));

    expect(heap.remove(n => n === 3)).toBe(3);
    expect(heap.remove(n => n === 42)).toBeUndefined();
    expect(heap.extractAll()).toEqual([1, 5, 7, 9]);
  });

  it('should order by due time then sequence', () => {
    const heap = new MinHeap<{ dueAt: number; seq: number }>((a, b) => a.dueAt - b.dueAt || a.seq - b.seq);
    heap.push({ dueAt: 100, seq: 2 });
    heap.push({ dueAt: 50, seq: 3 });
    heap.push({ dueAt: 100, seq: 1 });

    expect(heap.extractAll().map(e => e.seq)).toEqual([3, 1, 2]);
  });

  it('should return undefined from pop on an empty heap', () => {
    expect(new MinHeap<number>((a, b) => a - b).pop()).toBeUndefined();
  });
});
