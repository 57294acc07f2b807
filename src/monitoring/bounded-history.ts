/**
 * Bounded History
 *
 * Fixed-capacity ring of records. Appending to a full ring overwrites the
 * oldest entry, so writers never block and memory stays bounded. Reads return
 * copies in insertion order (oldest first).
 */
export class BoundedHistory<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0; // index of the oldest entry
  private size = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get length(): number {
    return this.size;
  }

  /**
   * Append an entry, evicting the oldest when full
   *
   * @returns the evicted entry, if any
   */
  push(item: T): T | undefined {
    if (this.size < this.capacity) {
      this.slots[(this.head + this.size) % this.capacity] = item;
      this.size++;
      return undefined;
    }

    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /**
   * Most recently appended entry
   */
  latest(): T | undefined {
    if (this.size === 0) {
      return undefined;
    }
    return this.slots[(this.head + this.size - 1) % this.capacity];
  }

  /**
   * Copy of the most recent `count` entries, oldest first
   */
  tail(count: number): T[] {
    const n = Math.max(0, Math.min(count, this.size));
    const result: T[] = [];
    for (let i = this.size - n; i < this.size; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) {
        result.push(item);
      }
    }
    return result;
  }

  /**
   * Copy of every entry, oldest first
   */
  toArray(): T[] {
    return this.tail(this.size);
  }
}
