/**
 * Memory System - two tiers with promotion on overflow
 *
 * 1. Short-term: small FIFO buffer of everything recently stored
 * 2. Long-term: promoted items, evicted by importance x access count
 * 3. Retrieval: loose substring search over both, counting accesses
 */

export * from './types.js';
export * from './item.js';
export * from './short-term.js';
export * from './long-term.js';
export * from './consolidation.js';
export * from './retriever.js';
export * from './system.js';
