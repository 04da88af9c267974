import { orderingComparator } from '../ordering';
import type { DrainDirection, EntryComparator, OrderingPolicy, TermStatsEntry } from '../types';

/**
 * Keeps the best `capacity` entries seen so far under an ordering.
 *
 * Backed by a binary heap whose root is the *worst* retained entry, so each
 * insert is O(log K) and a full stream of N candidates costs O(N log K).
 * The comparator must be a total order (every `OrderingPolicy` is), which
 * makes "worst" unique at all times.
 *
 * @example
 * ```ts
 * const top = new BoundedTopSet('count_desc', 2);
 * top.insert({ key: 'a', count: 1, total: 0 });
 * top.insert({ key: 'b', count: 5, total: 0 });
 * top.insert({ key: 'c', count: 3, total: 0 });
 * top.drain(); // b, c
 * ```
 */
export class BoundedTopSet {
  readonly capacity: number;

  private readonly heap: TermStatsEntry[] = [];
  private readonly compare: EntryComparator;
  private drained = false;

  constructor(ordering: OrderingPolicy | EntryComparator, capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`BoundedTopSet capacity must be an integer >= 1, got ${capacity}`);
    }
    this.capacity = capacity;
    this.compare = typeof ordering === 'function' ? ordering : orderingComparator(ordering);
  }

  get size(): number {
    return this.heap.length;
  }

  /**
   * The entry that would be evicted next, or `undefined` when empty.
   */
  peekWorst(): TermStatsEntry | undefined {
    return this.heap[0];
  }

  /**
   * Offer a candidate. Returns `true` if it is now retained.
   *
   * At capacity, the candidate replaces the current worst only when it ranks
   * strictly better; otherwise it is discarded.
   */
  insert(entry: TermStatsEntry): boolean {
    this.assertNotDrained();
    const heap = this.heap;

    if (heap.length < this.capacity) {
      heap.push(entry);
      this.siftUp(heap.length - 1);
      return true;
    }

    if (this.compare(entry, heap[0]) >= 0) return false;

    heap[0] = entry;
    this.siftDown(0);
    return true;
  }

  /**
   * Remove and return every retained entry in rank order. O(K log K).
   * The set cannot be used afterwards.
   */
  drain(direction: DrainDirection = 'best-first'): TermStatsEntry[] {
    this.assertNotDrained();
    this.drained = true;

    const out = new Array<TermStatsEntry>(this.heap.length);
    // Popping yields worst first; fill from the back for best-first.
    let writeIndex = direction === 'best-first' ? out.length - 1 : 0;
    const step = direction === 'best-first' ? -1 : 1;

    while (this.heap.length > 0) {
      out[writeIndex] = this.popWorst();
      writeIndex += step;
    }
    return out;
  }

  private popWorst(): TermStatsEntry {
    const heap = this.heap;
    const top = heap[0];
    const last = heap.pop();
    if (heap.length > 0 && last !== undefined) {
      heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  // worse(a, b): a ranks after b
  private worse(a: TermStatsEntry, b: TermStatsEntry): boolean {
    return this.compare(a, b) > 0;
  }

  private siftUp(index: number): void {
    const heap = this.heap;
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.worse(heap[i], heap[parent])) break;
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const heap = this.heap;
    const n = heap.length;
    let i = index;

    while (true) {
      const left = i * 2 + 1;
      const right = left + 1;
      let worst = i;

      if (left < n && this.worse(heap[left], heap[worst])) worst = left;
      if (right < n && this.worse(heap[right], heap[worst])) worst = right;
      if (worst === i) return;

      [heap[i], heap[worst]] = [heap[worst], heap[i]];
      i = worst;
    }
  }

  private assertNotDrained(): void {
    if (this.drained) {
      throw new Error('BoundedTopSet has already been drained');
    }
  }
}
