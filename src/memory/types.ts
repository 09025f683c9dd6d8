// Two-tier memory: a small recency buffer (STM) that overflows into a
// score-ranked long-term store (LTM) when items are important enough.

export type MemoryContent =
  | string
  | number
  | boolean
  | null
  | MemoryContent[]
  | { [key: string]: MemoryContent };

export type MemoryScope = 'stm' | 'ltm' | 'all';

export interface MemoryItem {
  id: string;
  content: MemoryContent;
  createdAt: Date;
  accessCount: number;
  importance: number;   // 0-1
  tags: Set<string>;
}

// Read-only copy handed out for inspection. Never a live reference.
export interface MemoryItemView {
  readonly id: string;
  readonly content: MemoryContent;
  readonly createdAt: Date;
  readonly accessCount: number;
  readonly importance: number;
  readonly tags: readonly string[];
}

export interface CreateMemoryInput {
  content: MemoryContent;
  importance?: number;
  tags?: Iterable<string>;
}

export type EvictionHandler = (item: MemoryItem) => void;

export interface ConsolidationOutcome {
  promoted: boolean;
  evicted?: MemoryItem;   // LTM item dropped to make room
}

export interface MemoryStats {
  stmSize: number;
  stmCapacity: number;
  ltmSize: number;
  ltmCapacity: number;
  promotions: number;
  discards: number;
  evictions: number;
  state: 'idle' | 'processing';
}

export interface SimilarMemoriesContent {
  stored: MemoryContent;
  similarMemories: MemoryContent[];
}
