/**
 * Insertion-ordered membership set with a fixed capacity. Once full, each
 * admission evicts the oldest admitted key, so retention is deterministic.
 */
export class BoundedSet<T> {
  private readonly items = new Set<T>();

  constructor(
    readonly capacity: number,
    initial: Iterable<T> = []
  ) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Invalid capacity: ${capacity}`);
    }
    for (const item of initial) this.add(item);
  }

  get size() {
    return this.items.size;
  }

  has(item: T) {
    return this.items.has(item);
  }

  /** Returns false when the key was already present (its position is kept). */
  add(item: T): boolean {
    if (this.items.has(item)) return false;
    if (this.capacity === 0) return false;
    this.items.add(item);
    while (this.items.size > this.capacity) {
      const oldest = this.items.values().next();
      if (oldest.done) break;
      this.items.delete(oldest.value);
    }
    return true;
  }

  values(): T[] {
    return Array.from(this.items);
  }
}
