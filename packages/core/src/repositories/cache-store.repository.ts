import type { SimilarityMetric } from '@triangulate/shared/src/utils/math.js';

export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs?: number): Promise<void>;
  expire(key: string, ttlMs: number): Promise<void>;
}

export interface VectorMatch {
  readonly id: string;
  readonly score: number;
}

export interface VectorIndex {
  upsert(namespace: string, id: string, vector: readonly number[]): Promise<void>;
  /** Up to `k` matches in the namespace, best score first. */
  nearest(
    namespace: string,
    k: number,
    vector: readonly number[],
    metric: SimilarityMetric,
  ): Promise<readonly VectorMatch[]>;
  remove(namespace: string, id: string): Promise<void>;
}

export interface CacheBackend {
  readonly keyValue: KeyValueStore;
  readonly vectorIndex: VectorIndex;
}
