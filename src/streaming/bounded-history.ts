/**
 * Fixed-capacity FIFO buffer. Appending at capacity evicts the oldest item.
 * Once closed, appends are rejected and the contents stay readable.
 */
export class BoundedHistory<T> {
  private items: T[] = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Returns false when the history has been closed to writes */
  append(item: T): boolean {
    if (this.closed) return false;
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
    return true;
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get length(): number {
    return this.items.length;
  }

  /** Oldest first */
  toArray(): T[] {
    return [...this.items];
  }

  last(): T | undefined {
    return this.items[this.items.length - 1];
  }
}
