import type { LongTermStore } from './long-term.js';
import type { ConsolidationOutcome, MemoryItem } from './types.js';

export const DEFAULT_PROMOTION_THRESHOLD = 0.5;

/**
 * Decides the fate of an item pushed out of short-term memory: it moves to
 * long-term memory when its importance is strictly above the threshold and
 * is dropped otherwise. The item itself is never modified.
 */
export class ConsolidationPolicy {
  constructor(
    private longTerm: LongTermStore,
    readonly threshold: number = DEFAULT_PROMOTION_THRESHOLD
  ) {}

  shouldPromote(item: MemoryItem): boolean {
    return item.importance > this.threshold;
  }

  consolidate(item: MemoryItem): ConsolidationOutcome {
    if (!this.shouldPromote(item)) {
      return { promoted: false };
    }

    const evicted = this.longTerm.insert(item);
    return evicted ? { promoted: true, evicted } : { promoted: true };
  }
}
