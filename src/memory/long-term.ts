import type { MemoryItem } from './types.js';

export function evictionScore(item: MemoryItem): number {
  return item.importance * item.accessCount;
}

/**
 * Bounded store of promoted items, kept in insertion order.
 *
 * Overflow removes exactly one resident: the lowest `importance * accessCount`,
 * earliest-inserted first on ties. Freshly inserted items have never been
 * accessed, score 0, and can be the one removed.
 */
export class LongTermStore {
  private items: MemoryItem[] = [];

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.items.length;
  }

  insert(item: MemoryItem): MemoryItem | undefined {
    this.items.push(item);

    if (this.items.length <= this.capacity) {
      return undefined;
    }

    return this.evictOne();
  }

  snapshot(): readonly MemoryItem[] {
    return Object.freeze([...this.items]);
  }

  clear(): void {
    this.items = [];
  }

  // Single linear scan; strict `<` keeps the earliest index among equal scores.
  private evictOne(): MemoryItem | undefined {
    if (this.items.length === 0) return undefined;

    let victim = 0;
    let lowest = evictionScore(this.items[0]);

    for (let i = 1; i < this.items.length; i++) {
      const score = evictionScore(this.items[i]);
      if (score < lowest) {
        lowest = score;
        victim = i;
      }
    }

    const [evicted] = this.items.splice(victim, 1);
    return evicted;
  }
}
