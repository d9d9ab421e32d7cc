import type { Comparator, TopKSelector } from "../heap.js";

/**
 * Binary heap holding at most `capacity` items, worst item on top.
 * "Worse" is defined by the ranking comparator: a is worse than b when cmp(a, b) > 0.
 */
class BoundedHeap<T> {
  private readonly data: T[] = [];

  constructor(
    private readonly capacity: number,
    private readonly cmp: Comparator<T>,
  ) {}

  /** Adds the item if there is room or it beats the current worst. */
  offer(item: T): void {
    if (this.data.length < this.capacity) {
      this.push(item);
      return;
    }
    const worst = this.data[0];
    if (worst !== undefined && this.cmp(item, worst) < 0) {
      this.data[0] = item;
      this.siftDown(0);
    }
  }

  private push(item: T): void {
    const a = this.data;
    a.push(item);
    let i = a.length - 1;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.worse(a[i]!, a[p]!)) break;
      [a[i], a[p]] = [a[p]!, a[i]!];
      i = p;
    }
  }

  toArray(): T[] {
    return Array.from(this.data);
  }

  private worse(a: T, b: T): boolean {
    return this.cmp(a, b) > 0;
  }

  private siftDown(i: number): void {
    const a = this.data;
    const n = a.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let worst = i;

      if (l < n && this.worse(a[l]!, a[worst]!)) worst = l;
      if (r < n && this.worse(a[r]!, a[worst]!)) worst = r;
      if (worst === i) return;

      [a[i], a[worst]] = [a[worst]!, a[i]!];
      i = worst;
    }
  }
}

/**
 * Keeps a fixed-size heap of the best K items, O(n log k).
 *
 * With a total order (the ranking comparators break ties by docId) the output
 * is identical to a full sort followed by slice(0, k).
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[] {
    if (k <= 0) return [];

    const heap = new BoundedHeap<T>(k, comparator);
    for (const item of items) heap.offer(item);

    const arr = heap.toArray();
    arr.sort(comparator);
    return arr;
  }
}
