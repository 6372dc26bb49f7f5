/**
 * Fixed-capacity FIFO. Pushing past capacity evicts from the front; order
 * of the retained items never changes.
 */
export class RingBuffer<T> {
  private slots: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(private cap: number) {
    if (!Number.isInteger(cap) || cap < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${cap}`);
    }
    this.slots = new Array<T | undefined>(cap);
  }

  get capacity(): number {
    return this.cap;
  }

  get size(): number {
    return this.count;
  }

  /** Append, returning the evicted item if the buffer was full. */
  push(item: T): T | undefined {
    if (this.count < this.cap) {
      this.slots[(this.head + this.count) % this.cap] = item;
      this.count++;
      return undefined;
    }
    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.cap;
    return evicted;
  }

  /** Item at `index` from the oldest, or undefined out of range. */
  at(index: number): T | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.count) return undefined;
    return this.slots[(this.head + index) % this.cap];
  }

  first(): T | undefined {
    return this.at(0);
  }

  last(): T | undefined {
    return this.at(this.count - 1);
  }

  /**
   * Change capacity. Shrinking keeps the newest items.
   */
  resize(capacity: number): void {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    const kept = this.toArray().slice(-capacity);
    this.cap = capacity;
    this.slots = new Array<T | undefined>(capacity);
    this.head = 0;
    this.count = 0;
    for (const item of kept) this.push(item);
  }

  clear(): void {
    this.slots = new Array<T | undefined>(this.cap);
    this.head = 0;
    this.count = 0;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.cap];
      if (item !== undefined) yield item;
    }
  }

  toArray(): T[] {
    return [...this];
  }
}
