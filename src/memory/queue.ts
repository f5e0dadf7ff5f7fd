export const DEFAULT_MEMORY_CAPACITY = 5;

/**
 * Bounded FIFO of earlier statements, oldest first. Storing past capacity
 * evicts the oldest entry.
 */
export class MemoryQueue {
  private items: string[] = [];
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_MEMORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Memory capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Append an entry. Blank entries are ignored.
   * Returns the evicted entry, if storing pushed one out.
   */
  store(entry: string): string | null {
    const trimmed = entry.trim();
    if (!trimmed) return null;

    this.items.push(trimmed);
    if (this.items.length > this.capacity) {
      return this.items.shift() ?? null;
    }
    return null;
  }

  /**
   * Oldest entry, or null when empty. Removes it unless `remove` is false.
   */
  recall(remove: boolean = true): string | null {
    if (this.items.length === 0) return null;
    if (!remove) return this.items[0];
    return this.items.shift() ?? null;
  }

  clear(): void {
    this.items = [];
  }

  hasMemory(): boolean {
    return this.items.length > 0;
  }

  get size(): number {
    return this.items.length;
  }

  /** Copy of the queue, oldest first */
  entries(): string[] {
    return [...this.items];
  }
}
