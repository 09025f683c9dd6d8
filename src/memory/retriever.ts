import type { ShortTermStore } from './short-term.js';
import type { LongTermStore } from './long-term.js';
import type { MemoryContent, MemoryItem, MemoryScope } from './types.js';
import { cloneContent, searchKey } from './item.js';

export const DEFAULT_SIMILAR_LIMIT = 5;

/**
 * Case-insensitive containment in either direction. Deliberately loose:
 * "cat" matches "cats are great" and the other way round. An empty key on
 * either side never matches.
 */
export function matches(query: MemoryContent, content: MemoryContent): boolean {
  return keysMatch(searchKey(query), searchKey(content));
}

function keysMatch(queryKey: string, itemKey: string): boolean {
  if (queryKey.length === 0 || itemKey.length === 0) return false;
  return itemKey.includes(queryKey) || queryKey.includes(itemKey);
}

export class RetrievalEngine {
  constructor(
    private shortTerm: ShortTermStore,
    private longTerm: LongTermStore
  ) {}

  /**
   * Exhaustive search. Results follow store order, short-term first, and
   * every matched item has its access count bumped once.
   */
  retrieve(query: MemoryContent, scope: MemoryScope = 'all'): MemoryContent[] {
    const queryKey = searchKey(query);
    const results: MemoryContent[] = [];

    for (const item of this.candidates(scope)) {
      if (keysMatch(queryKey, searchKey(item.content))) {
        item.accessCount += 1;
        results.push(cloneContent(item.content));
      }
    }

    return results;
  }

  /**
   * Same predicate and side effect as `retrieve`, but stops at `limit`
   * matches. Items after the cut-off are never visited.
   */
  findSimilar(query: MemoryContent, limit: number = DEFAULT_SIMILAR_LIMIT): MemoryContent[] {
    const results: MemoryContent[] = [];
    if (limit <= 0) return results;

    const queryKey = searchKey(query);

    for (const item of this.candidates('all')) {
      if (keysMatch(queryKey, searchKey(item.content))) {
        item.accessCount += 1;
        results.push(cloneContent(item.content));

        if (results.length >= limit) break;
      }
    }

    return results;
  }

  private *candidates(scope: MemoryScope): Generator<MemoryItem> {
    if (scope === 'all' || scope === 'stm') {
      yield* this.shortTerm.snapshot();
    }
    if (scope === 'all' || scope === 'ltm') {
      yield* this.longTerm.snapshot();
    }
  }
}
