import { describe, it, expect, beforeEach } from 'vitest';
import { ShortTermStore } from '../../src/memory/short-term.js';
import { LongTermStore, evictionScore } from '../../src/memory/long-term.js';
import { ConsolidationPolicy } from '../../src/memory/consolidation.js';
import { createMemoryItem } from '../../src/memory/item.js';
import type { MemoryItem } from '../../src/memory/types.js';

function item(content: string, importance = 0.5, accessCount = 0): MemoryItem {
  const created = createMemoryItem({ content, importance });
  created.accessCount = accessCount;
  return created;
}

function contents(items: readonly MemoryItem[]): unknown[] {
  return items.map((i) => i.content);
}

describe('ShortTermStore', () => {
  let evicted: MemoryItem[];
  let store: ShortTermStore;

  beforeEach(() => {
    evicted = [];
    store = new ShortTermStore(3, (i) => evicted.push(i));
  });

  it('keeps insertion order', () => {
    store.store(item('A'));
    store.store(item('B'));
    expect(contents(store.snapshot())).toEqual(['A', 'B']);
  });

  it('drops the oldest item once over capacity', () => {
    for (const c of ['A', 'B', 'C', 'D', 'E']) {
      store.store(item(c));
      expect(store.size).toBeLessThanOrEqual(3);
    }
    expect(contents(store.snapshot())).toEqual(['C', 'D', 'E']);
    expect(contents(evicted)).toEqual(['A', 'B']);
  });

  it('returns the evicted item from store', () => {
    const a = item('A');
    store.store(a);
    store.store(item('B'));
    expect(store.store(item('C'))).toBeUndefined();
    expect(store.store(item('D'))).toBe(a);
  });

  it('snapshot is a frozen copy', () => {
    store.store(item('A'));
    const snap = store.snapshot();
    store.store(item('B'));
    expect(snap).toHaveLength(1);
    expect(Object.isFrozen(snap)).toBe(true);
  });

  it('recent returns the newest items oldest first', () => {
    for (const c of ['A', 'B', 'C']) store.store(item(c));
    expect(contents(store.recent(2))).toEqual(['B', 'C']);
    expect(contents(store.recent(10))).toEqual(['A', 'B', 'C']);
    expect(store.recent(0)).toEqual([]);
  });

  it('clear is idempotent and does not evict', () => {
    store.store(item('A'));
    store.clear();
    store.clear();
    expect(store.size).toBe(0);
    expect(evicted).toHaveLength(0);
  });
});

describe('LongTermStore', () => {
  it('scores by importance times access count', () => {
    expect(evictionScore(item('x', 0.8, 3))).toBeCloseTo(2.4);
    expect(evictionScore(item('x', 0.9, 0))).toBe(0);
  });

  it('evicts the earliest-inserted among equal scores', () => {
    const store = new LongTermStore(2);
    const first = item('1', 0.7);
    store.insert(first);
    store.insert(item('2', 0.7));
    const evicted = store.insert(item('3', 0.7));

    expect(evicted).toBe(first);
    expect(contents(store.snapshot())).toEqual(['2', '3']);
  });

  it('evicts the lowest score regardless of position', () => {
    const store = new LongTermStore(3);
    store.insert(item('busy', 0.9, 5));     // 4.5
    store.insert(item('idle', 0.9, 1));     // 0.9
    store.insert(item('middle', 0.6, 4));   // 2.4
    const evicted = store.insert(item('fresh', 0.6, 2)); // 1.2

    expect(evicted?.content).toBe('idle');
    expect(contents(store.snapshot())).toEqual(['busy', 'middle', 'fresh']);
  });

  it('can evict the item just inserted', () => {
    const store = new LongTermStore(2);
    store.insert(item('a', 0.6, 2));
    store.insert(item('b', 0.6, 1));
    const evicted = store.insert(item('new', 1.0, 0));

    expect(evicted?.content).toBe('new');
    expect(contents(store.snapshot())).toEqual(['a', 'b']);
  });

  it('removes exactly one item per breaching insert', () => {
    const store = new LongTermStore(2);
    for (let i = 0; i < 10; i++) {
      store.insert(item(`m${i}`, 0.6));
      expect(store.size).toBeLessThanOrEqual(2);
    }
    expect(store.size).toBe(2);
  });

  it('clear is idempotent', () => {
    const store = new LongTermStore(2);
    store.insert(item('a'));
    store.clear();
    store.clear();
    expect(store.size).toBe(0);
  });
});

describe('ConsolidationPolicy', () => {
  let longTerm: LongTermStore;
  let policy: ConsolidationPolicy;

  beforeEach(() => {
    longTerm = new LongTermStore(10);
    policy = new ConsolidationPolicy(longTerm);
  });

  it('promotes only above the threshold', () => {
    expect(policy.consolidate(item('low', 0.3))).toEqual({ promoted: false });
    expect(policy.consolidate(item('edge', 0.5))).toEqual({ promoted: false });
    expect(policy.consolidate(item('high', 0.51))).toEqual({ promoted: true });
    expect(contents(longTerm.snapshot())).toEqual(['high']);
  });

  it('leaves the item untouched', () => {
    const promoted = item('high', 0.9, 2);
    policy.consolidate(promoted);
    expect(promoted.importance).toBe(0.9);
    expect(promoted.accessCount).toBe(2);
    expect(longTerm.snapshot()[0]).toBe(promoted);
  });

  it('reports the long-term item evicted to make room', () => {
    const small = new LongTermStore(1);
    const strict = new ConsolidationPolicy(small, 0.7);
    const first = item('first', 0.8);
    strict.consolidate(first);

    const outcome = strict.consolidate(item('second', 0.8));
    expect(outcome.promoted).toBe(true);
    expect(outcome.evicted).toBe(first);
    expect(strict.threshold).toBe(0.7);
  });
});
