import type { CognitiveModule, CognitiveState, Feedback, ModuleResponse } from '../core/module.js';
import type { InvalidConfigurationError, Result } from '../core/result.js';
import { formatZodIssues, invalidConfiguration, ok } from '../core/result.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import type { MemoryConfig, MemoryConfigInput } from '../config/index.js';
import { MemoryConfigSchema } from '../config/index.js';
import { ShortTermStore } from './short-term.js';
import { LongTermStore } from './long-term.js';
import { ConsolidationPolicy } from './consolidation.js';
import { RetrievalEngine } from './retriever.js';
import { cloneContent, createMemoryItem, toMemoryContent, toView } from './item.js';
import type {
  MemoryContent,
  MemoryItem,
  MemoryItemView,
  MemoryScope,
  MemoryStats,
  SimilarMemoriesContent,
} from './types.js';

export const PROCESS_CONFIDENCE = 0.9;

export type MemorySystemOptions = MemoryConfigInput & {
  name?: string;
  logger?: Logger;
};

/**
 * Memory system exposed to the registry as a cognitive module.
 *
 * Owns one short-term and one long-term store. Overflow from short-term goes
 * through the consolidation policy; retrieval reads both tiers and counts
 * accesses, which in turn feed the long-term eviction score.
 *
 * Every operation is synchronous and mutates only this instance.
 */
export class MemorySystemModule implements CognitiveModule {
  readonly name: string;
  private currentState: CognitiveState = 'idle';
  private shortTerm: ShortTermStore;
  private longTerm: LongTermStore;
  private consolidation: ConsolidationPolicy;
  private retriever: RetrievalEngine;
  private logger: Logger;
  private counters = { promotions: 0, discards: 0, evictions: 0 };

  /**
   * Validate options and build a module. Invalid settings produce an
   * `invalid_configuration` error and no instance.
   */
  static create(
    options: MemorySystemOptions = {}
  ): Result<MemorySystemModule, InvalidConfigurationError> {
    const { name, logger, ...settings } = options;
    const parsed = MemoryConfigSchema.safeParse(settings);

    if (!parsed.success) {
      return invalidConfiguration('Invalid memory settings', formatZodIssues(parsed.error));
    }

    return ok(new MemorySystemModule(parsed.data, { name, logger }));
  }

  /**
   * Takes already-validated settings; use `create` for untrusted input.
   */
  constructor(
    private settings: MemoryConfig,
    options: { name?: string; logger?: Logger } = {}
  ) {
    this.name = options.name ?? 'MemorySystem';
    this.logger = options.logger ?? silentLogger;
    this.longTerm = new LongTermStore(settings.ltmCapacity);
    this.consolidation = new ConsolidationPolicy(this.longTerm, settings.promotionThreshold);
    this.shortTerm = new ShortTermStore(settings.stmCapacity, (item) => this.onShortTermEvict(item));
    this.retriever = new RetrievalEngine(this.shortTerm, this.longTerm);
  }

  get state(): CognitiveState {
    return this.currentState;
  }

  /**
   * Remember the input at the default importance, then report what it
   * resembles. The input is always stored, even when it is only a query.
   */
  process(input: unknown): ModuleResponse<SimilarMemoriesContent> {
    this.currentState = 'processing';

    try {
      const content = toMemoryContent(input);
      this.store(content, this.settings.defaultImportance);
      const similar = this.findSimilar(content, this.settings.similarLimit);

      return {
        content: { stored: content, similarMemories: similar },
        confidence: PROCESS_CONFIDENCE,
        sourceModule: this.name,
        metadata: { memoryType: 'short_term' },
      };
    } finally {
      this.currentState = 'idle';
    }
  }

  /**
   * Any feedback with a `reinforce` key boosts the newest short-term items,
   * whatever its value. Everything else is ignored.
   */
  update(feedback: Feedback): void {
    if (!('reinforce' in feedback)) {
      return;
    }

    const recent = this.shortTerm.recent(this.settings.reinforceWindow);
    for (const item of recent) {
      item.importance = Math.min(1, item.importance * this.settings.reinforceFactor);
    }

    this.logger.debug('Reinforced recent memories', { count: recent.length });
  }

  store(
    content: MemoryContent,
    importance: number = this.settings.defaultImportance,
    tags: Iterable<string> = []
  ): void {
    this.shortTerm.store(createMemoryItem({ content: toMemoryContent(content), importance, tags }));
  }

  retrieve(query: MemoryContent, scope: MemoryScope = 'all'): MemoryContent[] {
    return this.retriever.retrieve(query, scope);
  }

  findSimilar(query: MemoryContent, limit: number = this.settings.similarLimit): MemoryContent[] {
    return this.retriever.findSimilar(query, limit);
  }

  getStmContents(): MemoryContent[] {
    return this.shortTerm.snapshot().map((item) => cloneContent(item.content));
  }

  getLtmContents(): MemoryContent[] {
    return this.longTerm.snapshot().map((item) => cloneContent(item.content));
  }

  getStmItems(): MemoryItemView[] {
    return this.shortTerm.snapshot().map(toView);
  }

  getLtmItems(): MemoryItemView[] {
    return this.longTerm.snapshot().map(toView);
  }

  clearStm(): void {
    this.shortTerm.clear();
  }

  clearLtm(): void {
    this.longTerm.clear();
  }

  getSettings(): MemoryConfig {
    return { ...this.settings };
  }

  getStats(): MemoryStats {
    return {
      stmSize: this.shortTerm.size,
      stmCapacity: this.shortTerm.capacity,
      ltmSize: this.longTerm.size,
      ltmCapacity: this.longTerm.capacity,
      ...this.counters,
      state: this.currentState,
    };
  }

  private onShortTermEvict(item: MemoryItem): void {
    const outcome = this.consolidation.consolidate(item);

    if (!outcome.promoted) {
      this.counters.discards++;
      this.logger.debug('Discarded short-term memory', { id: item.id, importance: item.importance });
      return;
    }

    this.counters.promotions++;
    this.logger.debug('Promoted to long-term memory', { id: item.id, importance: item.importance });

    if (outcome.evicted) {
      this.counters.evictions++;
      this.logger.debug('Evicted from long-term memory', {
        id: outcome.evicted.id,
        importance: outcome.evicted.importance,
        accessCount: outcome.evicted.accessCount,
      });
    }
  }
}
