/**
 * Fixed-capacity FIFO backed by a preallocated array.
 */
export class RingBuffer<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private length = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.length;
  }

  isFull(): boolean {
    return this.length === this.capacity;
  }

  /**
   * Append an item. When full, the oldest item is overwritten and returned.
   */
  push(item: T): T | undefined {
    const tail = (this.head + this.length) % this.capacity;
    if (this.length < this.capacity) {
      this.slots[tail] = item;
      this.length++;
      return undefined;
    }

    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  shift(): T | undefined {
    if (this.length === 0) {
      return undefined;
    }
    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.length--;
    return item;
  }

  /**
   * Remove up to `max` items from the front, oldest first.
   */
  drain(max: number = this.length): T[] {
    const count = Math.min(max, this.length);
    const items: T[] = [];
    for (let i = 0; i < count; i++) {
      const item = this.shift();
      if (item !== undefined) {
        items.push(item);
      }
    }
    return items;
  }
}
