import type { AgentResult, ValidatedResult } from './research.types.js';

export type CachePayload =
  | { readonly kind: 'agent-result'; readonly value: AgentResult }
  | { readonly kind: 'validated-result'; readonly value: ValidatedResult };

export interface CacheEntry {
  readonly id: string;
  readonly scope: string;
  readonly queryText: string;
  readonly queryEmbedding: readonly number[];
  readonly payload: CachePayload;
  readonly createdAt: Date;
  readonly ttlMs: number;
}

export interface CachedResult {
  readonly entry: CacheEntry;
  readonly similarity: number;
}
