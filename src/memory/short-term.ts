import type { EvictionHandler, MemoryItem } from './types.js';

/**
 * Bounded recency buffer. Appends at the tail and, once over capacity,
 * drops the head and passes it to the eviction handler.
 */
export class ShortTermStore {
  private items: MemoryItem[] = [];

  constructor(
    readonly capacity: number,
    private onEvict: EvictionHandler = () => {}
  ) {}

  get size(): number {
    return this.items.length;
  }

  store(item: MemoryItem): MemoryItem | undefined {
    this.items.push(item);

    if (this.items.length <= this.capacity) {
      return undefined;
    }

    const oldest = this.items.shift();
    if (oldest) {
      this.onEvict(oldest);
    }
    return oldest;
  }

  /**
   * The most recent `count` items, oldest first.
   */
  recent(count: number): readonly MemoryItem[] {
    if (count <= 0) return [];
    return this.items.slice(-count);
  }

  snapshot(): readonly MemoryItem[] {
    return Object.freeze([...this.items]);
  }

  clear(): void {
    this.items = [];
  }
}
