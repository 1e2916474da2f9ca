/**
 * Bounded FIFO handed between the session and its fetch workers.
 *
 * `pop` never waits: an empty queue means there is no more work for this run,
 * since everything is enqueued before the first worker starts.
 */
export class WorkQueue<T> {
  private items: T[] = [];
  private head = 0;
  private readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Queue capacity must be a non-negative integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  public get size(): number {
    return this.items.length - this.head;
  }

  public get isEmpty(): boolean {
    return this.size === 0;
  }

  public push(item: T): void {
    if (this.size >= this.capacity) {
      throw new RangeError(`Queue is full (capacity ${this.capacity})`);
    }
    this.items.push(item);
  }

  public pop(): T | undefined {
    if (this.isEmpty) {
      return undefined;
    }
    const item = this.items[this.head];
    this.head++;

    // compact once the consumed prefix dominates
    if (this.head > 64 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }
}
