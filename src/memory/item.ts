import { nanoid } from 'nanoid';
import type { CreateMemoryInput, MemoryContent, MemoryItem, MemoryItemView } from './types.js';

export const DEFAULT_IMPORTANCE = 0.5;

export function clampImportance(importance: number): number {
  if (Number.isNaN(importance)) return DEFAULT_IMPORTANCE;
  return Math.min(1, Math.max(0, importance));
}

export function createMemoryItem(input: CreateMemoryInput): MemoryItem {
  return {
    id: nanoid(),
    content: input.content,
    createdAt: new Date(),
    accessCount: 0,
    importance: clampImportance(input.importance ?? DEFAULT_IMPORTANCE),
    tags: new Set(input.tags ?? []),
  };
}

export function toView(item: MemoryItem): MemoryItemView {
  return {
    id: item.id,
    content: cloneContent(item.content),
    createdAt: new Date(item.createdAt.getTime()),
    accessCount: item.accessCount,
    importance: item.importance,
    tags: [...item.tags],
  };
}

/**
 * Deep copy of stored content, so snapshots cannot be used to reach into a
 * store and mutate what it holds.
 */
export function cloneContent(content: MemoryContent): MemoryContent {
  if (Array.isArray(content)) {
    return content.map(cloneContent);
  }
  if (content !== null && typeof content === 'object') {
    return Object.fromEntries(
      Object.entries(content).map(([key, value]): [string, MemoryContent] => [key, cloneContent(value)])
    );
  }
  return content;
}

/**
 * Coerce an arbitrary input into storable content. Anything JSON cannot carry
 * (undefined, functions, symbols, bigints) becomes null or its string form.
 */
export function toMemoryContent(value: unknown, seen: WeakSet<object> = new WeakSet()): MemoryContent {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'object': {
      if (value instanceof Date) return value.toISOString();
      if (seen.has(value)) return '[Circular]';
      seen.add(value);

      const converted: MemoryContent = Array.isArray(value)
        ? value.map((entry: unknown) => toMemoryContent(entry, seen))
        : Object.fromEntries(
            Object.entries(value).map(([key, entry]): [string, MemoryContent] => [
              key,
              toMemoryContent(entry, seen),
            ])
          );

      seen.delete(value);
      return converted;
    }
    default:
      return String(value);
  }
}

/**
 * Lower-cased projection used only for matching. Strings project to
 * themselves; everything else to its JSON text.
 */
export function searchKey(content: MemoryContent): string {
  const text = typeof content === 'string' ? content : JSON.stringify(content);
  return text.toLowerCase();
}

export function formatContent(content: MemoryContent): string {
  return typeof content === 'string' ? content : JSON.stringify(content);
}
