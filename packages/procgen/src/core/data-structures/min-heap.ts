/**
 * Binary min-heap with a stable tie-break.
 *
 * Entries that compare equal pop in insertion order, which keeps A*
 * expansion order reproducible across runs.
 */

export type MinHeapCompare<T> = (a: T, b: T) => number;

interface HeapEntry<T> {
  readonly value: T;
  readonly seq: number;
}

export class MinHeap<T> {
  private readonly items: HeapEntry<T>[] = [];
  private readonly compare: MinHeapCompare<T>;
  private sequence = 0;

  constructor(compare: MinHeapCompare<T>) {
    this.compare = compare;
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  peek(): T | undefined {
    return this.items[0]?.value;
  }

  push(value: T): void {
    this.items.push({ value, seq: this.sequence++ });
    this.bubbleUp(this.items.length - 1);
  }

  pop(): T | undefined {
    const best = this.items[0];
    const tail = this.items.pop();
    if (best === undefined || tail === undefined) return undefined;
    if (this.items.length > 0) {
      this.items[0] = tail;
      this.bubbleDown(0);
    }
    return best.value;
  }

  clear(): void {
    this.items.length = 0;
    this.sequence = 0;
  }

  private less(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
    const order = this.compare(a.value, b.value);
    return order < 0 || (order === 0 && a.seq < b.seq);
  }

  private bubbleUp(startIndex: number): void {
    let index = startIndex;
    const entry = this.items[index];
    if (entry === undefined) return;

    while (index > 0) {
      const parent = (index - 1) >> 1;
      const parentEntry = this.items[parent]!;
      if (!this.less(entry, parentEntry)) break;
      this.items[index] = parentEntry;
      index = parent;
    }

    this.items[index] = entry;
  }

  private bubbleDown(startIndex: number): void {
    let index = startIndex;
    const entry = this.items[index];
    if (entry === undefined) return;
    const length = this.items.length;

    while (true) {
      const left = index * 2 + 1;
      if (left >= length) break;
      const right = left + 1;

      let bestChild = left;
      if (right < length && this.less(this.items[right]!, this.items[left]!)) {
        bestChild = right;
      }

      const childEntry = this.items[bestChild]!;
      if (!this.less(childEntry, entry)) break;

      this.items[index] = childEntry;
      index = bestChild;
    }

    this.items[index] = entry;
  }
}
