// ═══════════════════════════════════════════════════════════════════════════════
// RECENT BUFFER — Fixed-Capacity FIFO of the Latest Items
// ═══════════════════════════════════════════════════════════════════════════════

export class RecentBuffer<T> {
  private items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`RecentBuffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  get length(): number {
    return this.items.length;
  }

  /**
   * Append an item, evicting the oldest when full. Returns the evicted item.
   */
  push(item: T): T | undefined {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      return this.items.shift();
    }
    return undefined;
  }

  /**
   * The last `count` items, oldest first.
   */
  tail(count: number): T[] {
    const n = Math.floor(count);
    // slice(-0) would return everything
    if (!(n > 0)) return [];
    return this.items.slice(-n);
  }

  toArray(): T[] {
    return [...this.items];
  }

  clear(): void {
    this.items = [];
  }
}
