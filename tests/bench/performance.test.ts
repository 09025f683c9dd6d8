import { describe, it, expect } from 'vitest';
import { MemorySystemModule } from '../../src/memory/system.js';
import { LongTermStore } from '../../src/memory/long-term.js';
import { createMemoryItem } from '../../src/memory/item.js';

function createMemory(stmCapacity: number, ltmCapacity: number): MemorySystemModule {
  const created = MemorySystemModule.create({ stmCapacity, ltmCapacity });
  if (!created.ok) throw new Error(created.error.message);
  return created.value;
}

describe('performance: long-term eviction', () => {
  it('inserts 5000 items into a full 1000-slot store under 500ms', () => {
    const store = new LongTermStore(1000);

    const start = performance.now();
    for (let i = 0; i < 5000; i++) {
      const item = createMemoryItem({ content: `memory ${i}`, importance: 0.9 });
      item.accessCount = i % 7;
      store.insert(item);
    }
    const elapsed = performance.now() - start;

    expect(store.size).toBe(1000);
    expect(elapsed).toBeLessThan(500);
  });
});

describe('performance: retrieval', () => {
  it('searches 1000 long-term items under 50ms', () => {
    const memory = createMemory(7, 1000);
    for (let i = 0; i < 1007; i++) {
      memory.store(`fact number ${i}`, 0.9);
    }

    const start = performance.now();
    const results = memory.retrieve('number 99');
    const elapsed = performance.now() - start;

    // "number 99" and "number 990" through "number 999"
    expect(results).toHaveLength(11);
    expect(elapsed).toBeLessThan(50);
  });

  it('findSimilar stops early on a large store', () => {
    const memory = createMemory(7, 1000);
    for (let i = 0; i < 1007; i++) {
      memory.store(`fact number ${i}`, 0.9);
    }

    expect(memory.findSimilar('fact', 3)).toEqual(['fact number 1000', 'fact number 1001', 'fact number 1002']);
  });
});
