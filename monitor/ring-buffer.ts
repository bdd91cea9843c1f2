/** Fixed-capacity FIFO; pushing onto a full buffer evicts the oldest item. */
export class RingBuffer<T> {
  private readonly slots: (T | undefined)[];
  private head = 0; // index of the oldest item
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  push(item: T): void {
    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = item;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /** The newest `min(limit, size)` items, oldest first. */
  tail(limit: number): T[] {
    const n = Math.max(0, Math.min(Math.floor(limit), this.count));
    const out: T[] = [];
    for (let i = this.count - n; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }
}
