/**
 * Circular Buffer
 *
 * Fixed-capacity ring used for rolling histories. When full, a push
 * overwrites the oldest entry.
 */

export class CircularBuffer<T> {
  private readonly buffer: Array<T | undefined>;
  private head = 0;
  private tail = 0;
  private count = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error('CircularBuffer capacity must be a positive integer');
    }
    this.buffer = new Array<T | undefined>(capacity).fill(undefined);
  }

  get capacity(): number {
    return this.buffer.length;
  }

  get size(): number {
    return this.count;
  }

  get isFull(): boolean {
    return this.count >= this.buffer.length;
  }

  /**
   * Add an item, overwriting the oldest if full. O(1)
   *
   * @returns The evicted item, if any
   */
  pushOverwrite(item: T): T | undefined {
    let evicted: T | undefined;
    if (this.count === this.buffer.length) {
      evicted = this.buffer[this.head];
      this.head = (this.head + 1) % this.buffer.length;
    } else {
      this.count++;
    }

    this.buffer[this.tail] = item;
    this.tail = (this.tail + 1) % this.buffer.length;
    return evicted;
  }

  /**
   * Items from oldest to newest. O(n)
   */
  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(this.head + i) % this.buffer.length];
      if (item !== undefined) result.push(item);
    }
    return result;
  }

  /**
   * The newest `n` items, newest first.
   */
  latest(n: number): T[] {
    return this.toArray().reverse().slice(0, Math.max(0, n));
  }

  countWhere(predicate: (item: T) => boolean): number {
    return this.toArray().filter(predicate).length;
  }

  clear(): void {
    this.buffer.fill(undefined);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }
}
