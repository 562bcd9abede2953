const COMPACT_THRESHOLD = 64;

/**
 * Append-only queue of epoch-millisecond timestamps in arrival order.
 *
 * Removal only happens from the front, so the backing array is read from a
 * moving head index and compacted once the dead prefix outgrows the live part.
 */
export class TimestampQueue {
  private items: number[] = [];
  private head = 0;

  get size(): number {
    return this.items.length - this.head;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  /** Oldest retained timestamp, or undefined when empty */
  peekOldest(): number | undefined {
    return this.isEmpty ? undefined : this.items[this.head];
  }

  push(timestamp: number): void {
    this.items.push(timestamp);
  }

  /**
   * Drop every timestamp at or before the cutoff.
   * @returns number of entries removed
   */
  dropUntil(cutoff: number): number {
    const start = this.head;
    while (this.head < this.items.length && this.items[this.head] <= cutoff) {
      this.head++;
    }
    const removed = this.head - start;
    this.compact();
    return removed;
  }

  toArray(): number[] {
    return this.items.slice(this.head);
  }

  private compact(): void {
    if (this.head === this.items.length) {
      this.items = [];
      this.head = 0;
      return;
    }
    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }
}
