import { describe, it, expect, beforeEach } from 'vitest';
import { ModuleRegistry } from '../../src/core/registry.js';
import type { CognitiveModule, Feedback, ModuleResponse } from '../../src/core/module.js';
import { MemorySystemModule } from '../../src/memory/system.js';

class EchoModule implements CognitiveModule {
  readonly state = 'idle' as const;
  feedback: Feedback[] = [];

  constructor(readonly name: string) {}

  process(input: unknown): ModuleResponse {
    return { content: input, confidence: 0.5, sourceModule: this.name, metadata: {} };
  }

  update(feedback: Feedback): void {
    this.feedback.push(feedback);
  }
}

describe('ModuleRegistry', () => {
  let registry: ModuleRegistry;

  beforeEach(() => {
    registry = new ModuleRegistry({ maxStreamLength: 3 });
  });

  it('registers modules in order', () => {
    expect(registry.register(new EchoModule('a')).ok).toBe(true);
    expect(registry.register(new EchoModule('b')).ok).toBe(true);
    expect(registry.names()).toEqual(['a', 'b']);
  });

  it('rejects a duplicate name without replacing the original', () => {
    const original = new EchoModule('a');
    registry.register(original);

    const result = registry.register(new EchoModule('a'));

    expect(result).toEqual({
      ok: false,
      error: { kind: 'invalid_configuration', message: 'Module already registered: a', issues: [] },
    });
    expect(registry.get('a')).toBe(original);
  });

  it('unregisters by name', () => {
    registry.register(new EchoModule('a'));
    expect(registry.unregister('a')).toBe(true);
    expect(registry.unregister('a')).toBe(false);
    expect(registry.names()).toEqual([]);
  });

  it('dispatches to every module without a target', () => {
    registry.register(new EchoModule('a'));
    registry.register(new EchoModule('b'));

    const result = registry.dispatch('hi');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.map((r) => r.sourceModule)).toEqual(['a', 'b']);
    }
  });

  it('dispatches to a single target', () => {
    registry.register(new EchoModule('a'));
    registry.register(new EchoModule('b'));

    const result = registry.dispatch('hi', 'b');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.map((r) => r.sourceModule)).toEqual(['b']);
    }
  });

  it('reports an unknown target', () => {
    const result = registry.dispatch('hi', 'missing');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Unknown module: missing');
    }
    expect(registry.stream()).toEqual([]);
  });

  it('keeps only the newest responses in the stream', () => {
    registry.register(new EchoModule('a'));
    for (const input of ['1', '2', '3', '4', '5']) registry.dispatch(input);

    expect(registry.stream().map((r) => r.content)).toEqual(['3', '4', '5']);
    expect(registry.status()).toEqual({
      modules: [{ name: 'a', state: 'idle' }],
      streamLength: 3,
    });

    registry.clearStream();
    expect(registry.stream()).toEqual([]);
  });

  it('broadcasts feedback to every module', () => {
    const a = new EchoModule('a');
    const b = new EchoModule('b');
    registry.register(a);
    registry.register(b);

    registry.broadcastFeedback({ reinforce: true });

    expect(a.feedback).toEqual([{ reinforce: true }]);
    expect(b.feedback).toEqual([{ reinforce: true }]);
  });

  it('drives the memory module through the shared interface', () => {
    const created = MemorySystemModule.create({ stmCapacity: 2 });
    if (!created.ok) throw new Error(created.error.message);
    const memory = created.value;
    registry.register(memory);

    registry.dispatch('first note', 'MemorySystem');
    const result = registry.dispatch('note', 'MemorySystem');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value[0].content).toEqual({
        stored: 'note',
        similarMemories: ['first note', 'note'],
      });
      expect(result.value[0].confidence).toBe(0.9);
    }

    registry.broadcastFeedback({ reinforce: true });
    expect(memory.getStmItems().map((i) => i.importance)).toEqual([0.6, 0.6]);
  });
});
