/**
 * Fixed-capacity FIFO. Pushing onto a full queue evicts the oldest item.
 */
export class BoundedQueue<T> {
  private items: T[] = [];
  readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get length() { return this.items.length; }

  /** Returns the evicted item, if any. */
  push(item: T): T | undefined {
    this.items.push(item);
    return this.items.length > this.capacity ? this.items.shift() : undefined;
  }

  includes(item: T): boolean {
    return this.items.includes(item);
  }

  /** Removes the first occurrence of `item`. */
  remove(item: T): boolean {
    const at = this.items.indexOf(item);
    if (at < 0) return false;
    this.items.splice(at, 1);
    return true;
  }

  /** The newest `n` items, oldest first. */
  last(n: number): T[] {
    return n > 0 ? this.items.slice(-n) : [];
  }

  clear(): void {
    this.items = [];
  }

  toArray(): T[] {
    return [...this.items];
  }
}
