/**
 * Binary min-heap ordered by a comparator.
 *
 * The submission engine keeps one per platform: the comparator orders by
 * tier, then deadline, then arrival sequence, so pop() always yields the
 * next request to dispatch.
 *
 * @example
 * const heap = new MinHeap<QueuedAttempt>((a, b) => a.tier - b.tier || a.seq - b.seq);
 * heap.push(item);
 * const next = heap.pop();
 */
export class MinHeap<T> {
  private heap: T[] = [];
  private readonly compare: (a: T, b: T) => number;

  /**
   * @param compareFn - Negative if a sorts before b, positive if after, 0 if equal
   */
  constructor(compareFn: (a: T, b: T) => number) {
    this.compare = compareFn;
  }

  get size(): number {
    return this.heap.length;
  }

  get isEmpty(): boolean {
    return this.heap.length === 0;
  }

  peek(): T | undefined {
    return this.heap[0];
  }

  /** O(log n) */
  push(value: T): void {
    this.heap.push(value);
    this.bubbleUp(this.heap.length - 1);
  }

  /** O(log n) */
  pop(): T | undefined {
    const last = this.heap.pop();
    if (last === undefined || this.heap.length === 0) return last;

    const min = this.heap[0];
    this.heap[0] = last;
    this.bubbleDown(0);
    return min;
  }

  /**
   * Remove the first element matching `predicate`. O(n)
   *
   * @returns The removed element, or undefined if none matched
   */
  remove(predicate: (value: T) => boolean): T | undefined {
    const index = this.heap.findIndex(predicate);
    if (index === -1) return undefined;

    const removed = this.heap[index];
    const last = this.heap.pop();
    if (last !== undefined && index < this.heap.length) {
      this.heap[index] = last;
      this.bubbleUp(index);
      this.bubbleDown(index);
    }
    return removed;
  }

  /** Elements in heap order (not sorted). */
  toArray(): T[] {
    return [...this.heap];
  }

  /** Empties the heap, returning its elements in ascending order. O(n log n) */
  extractAll(): T[] {
    const result: T[] = [];
    let next = this.pop();
    while (next !== undefined) {
      result.push(next);
      next = this.pop();
    }
    return result;
  }

  clear(): void {
    this.heap = [];
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (this.compare(this.heap[index], this.heap[parentIndex]) >= 0) break;
      this.swap(index, parentIndex);
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.heap.length;
    while (true) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;
      let smallest = index;

      if (leftChild < length && this.compare(this.heap[leftChild], this.heap[smallest]) < 0) {
        smallest = leftChild;
      }
      if (rightChild < length && this.compare(this.heap[rightChild], this.heap[smallest]) < 0) {
        smallest = rightChild;
      }
      if (smallest === index) break;

      this.swap(index, smallest);
      index = smallest;
    }
  }

  private swap(i: number, j: number): void {
    const temp = this.heap[i];
    this.heap[i] = this.heap[j];
    this.heap[j] = temp;
  }
}
