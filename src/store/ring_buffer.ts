/**
 * Fixed-capacity newest-first buffer. Pushing into a full buffer overwrites
 * the oldest slot, so push and evict are O(1).
 */
export class RingBuffer<T> {
  private slots: Array<T | undefined> = [];
  /** Index of the newest item. */
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.count;
  }

  /**
   * Add `item` as the newest entry. Returns the entry that fell off the back, if any.
   */
  pushFront(item: T): T | undefined {
    if (this.capacity === 0) {
      return item;
    }

    if (this.slots.length < this.capacity) {
      // Still growing: keep slots in newest-last order and let `at` translate.
      this.slots.push(item);
      this.head = this.slots.length - 1;
      this.count = this.slots.length;
      return undefined;
    }

    // Full: the slot after the newest holds the oldest.
    this.head = (this.head + 1) % this.capacity;
    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    return evicted;
  }

  /**
   * Item at `index` counted from the newest (0).
   */
  at(index: number): T | undefined {
    if (index < 0 || index >= this.count) return undefined;
    const slot = (this.head - index + this.capacity) % this.capacity;
    return this.slots[slot];
  }

  /**
   * Newest-first copy of up to `limit` items.
   */
  toArray(limit: number = this.count): T[] {
    const items: T[] = [];
    const end = Math.min(Math.max(limit, 0), this.count);
    for (let i = 0; i < end; i += 1) {
      const item = this.slots[(this.head - i + this.capacity) % this.capacity];
      if (item !== undefined) items.push(item);
    }
    return items;
  }

  clear(): void {
    this.slots = [];
    this.head = 0;
    this.count = 0;
  }
}
