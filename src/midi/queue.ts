// ─── Event Queue ────────────────────────────────────────────────────────────
//
// Unbounded FIFO between the device callback (producer) and the tick loop
// (consumer). Enqueue never blocks; dequeue returns undefined when empty.
// ─────────────────────────────────────────────────────────────────────────────

const COMPACT_THRESHOLD = 1024;

export class EventQueue<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  dequeue(): T | undefined {
    if (this.head >= this.items.length) return undefined;
    const item = this.items[this.head];
    this.head++;
    if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }

  /** Remove and return everything queued, oldest first. */
  drain(): T[] {
    const out = this.items.slice(this.head);
    this.clear();
    return out;
  }

  clear(): void {
    this.items = [];
    this.head = 0;
  }
}
