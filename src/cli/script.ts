/**
 * Replay scripts: a JSON list of memory operations run against a fresh
 * module, for reproducing a session outside the REPL.
 *
 * {
 *   "memory": { "stmCapacity": 3 },
 *   "operations": [
 *     { "op": "store", "content": "A", "importance": 0.8 },
 *     { "op": "retrieve", "query": "a", "scope": "ltm" }
 *   ]
 * }
 */

import { z } from 'zod';
import * as fs from 'fs';
import type { MemoryContent, MemoryStats } from '../memory/types.js';
import type { MemorySystemModule } from '../memory/system.js';
import type { InvalidConfigurationError, Result } from '../core/result.js';
import { formatZodIssues, invalidConfiguration, ok } from '../core/result.js';
import { MemoryConfigSchema } from '../config/index.js';

export const MemoryContentSchema: z.ZodType<MemoryContent> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(MemoryContentSchema),
    z.record(MemoryContentSchema),
  ])
);

const ScopeSchema = z.enum(['stm', 'ltm', 'all']);

export const OperationSchema = z.discriminatedUnion('op', [
  z.object({
    op: z.literal('store'),
    content: MemoryContentSchema,
    importance: z.number().min(0).max(1).optional(),
    tags: z.array(z.string()).optional(),
  }),
  z.object({ op: z.literal('process'), input: MemoryContentSchema }),
  z.object({ op: z.literal('retrieve'), query: MemoryContentSchema, scope: ScopeSchema.optional() }),
  z.object({ op: z.literal('similar'), query: MemoryContentSchema, limit: z.number().int().optional() }),
  z.object({ op: z.literal('update'), feedback: z.record(z.unknown()) }),
  z.object({ op: z.literal('clear'), tier: z.enum(['stm', 'ltm']) }),
]);

export const ScriptSchema = z.object({
  memory: MemoryConfigSchema.partial().optional(),
  operations: z.array(OperationSchema),
});

export type Operation = z.infer<typeof OperationSchema>;
export type Script = z.infer<typeof ScriptSchema>;

export interface StepResult {
  index: number;
  op: Operation['op'];
  results?: MemoryContent[];
}

export interface ScriptResult {
  steps: StepResult[];
  stm: MemoryContent[];
  ltm: MemoryContent[];
  stats: MemoryStats;
}

export function parseScript(raw: unknown): Result<Script, InvalidConfigurationError> {
  const parsed = ScriptSchema.safeParse(raw);
  if (!parsed.success) {
    return invalidConfiguration('Invalid replay script', formatZodIssues(parsed.error));
  }
  return ok(parsed.data);
}

export function loadScript(file: string): Result<Script, InvalidConfigurationError> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return invalidConfiguration(`Cannot read replay script at ${file}`, [reason]);
  }
  return parseScript(raw);
}

function runOperation(memory: MemorySystemModule, operation: Operation): MemoryContent[] | undefined {
  switch (operation.op) {
    case 'store':
      memory.store(operation.content, operation.importance, operation.tags);
      return undefined;
    case 'process':
      return memory.process(operation.input).content.similarMemories;
    case 'retrieve':
      return memory.retrieve(operation.query, operation.scope);
    case 'similar':
      return memory.findSimilar(operation.query, operation.limit);
    case 'update':
      memory.update(operation.feedback);
      return undefined;
    case 'clear':
      if (operation.tier === 'stm') {
        memory.clearStm();
      } else {
        memory.clearLtm();
      }
      return undefined;
  }
}

export function runScript(memory: MemorySystemModule, operations: Operation[]): ScriptResult {
  const steps = operations.map((operation, index): StepResult => {
    const results = runOperation(memory, operation);
    return results ? { index, op: operation.op, results } : { index, op: operation.op };
  });

  return {
    steps,
    stm: memory.getStmContents(),
    ltm: memory.getLtmContents(),
    stats: memory.getStats(),
  };
}
