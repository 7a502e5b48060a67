import { similarity } from '@triangulate/shared/src/utils/math.js';
import type { SimilarityMetric } from '@triangulate/shared/src/utils/math.js';
import type {
  CacheBackend,
  KeyValueStore,
  VectorIndex,
  VectorMatch,
} from './cache-store.repository.js';

interface StoredValue {
  readonly value: string;
  readonly expiresAt?: number;
}

export function createInMemoryKeyValueStore(): KeyValueStore {
  const values = new Map<string, StoredValue>();

  return {
    get(key: string): Promise<string | null> {
      const stored = values.get(key);
      if (!stored) {
        return Promise.resolve(null);
      }

      if (stored.expiresAt !== undefined && stored.expiresAt <= Date.now()) {
        values.delete(key);
        return Promise.resolve(null);
      }

      return Promise.resolve(stored.value);
    },

    set(key: string, value: string, ttlMs?: number): Promise<void> {
      values.set(key, {
        value,
        expiresAt: ttlMs !== undefined ? Date.now() + ttlMs : undefined,
      });
      return Promise.resolve();
    },

    expire(key: string, ttlMs: number): Promise<void> {
      const stored = values.get(key);
      if (!stored) {
        return Promise.resolve();
      }
      if (ttlMs <= 0) {
        values.delete(key);
        return Promise.resolve();
      }
      values.set(key, { value: stored.value, expiresAt: Date.now() + ttlMs });
      return Promise.resolve();
    },
  };
}

export function createInMemoryVectorIndex(): VectorIndex {
  const namespaces = new Map<string, Map<string, readonly number[]>>();

  return {
    upsert(namespace: string, id: string, vector: readonly number[]): Promise<void> {
      let vectors = namespaces.get(namespace);
      if (!vectors) {
        vectors = new Map();
        namespaces.set(namespace, vectors);
      }
      vectors.set(id, [...vector]);
      return Promise.resolve();
    },

    nearest(
      namespace: string,
      k: number,
      vector: readonly number[],
      metric: SimilarityMetric,
    ): Promise<readonly VectorMatch[]> {
      const vectors = namespaces.get(namespace);
      if (!vectors) {
        return Promise.resolve([]);
      }

      const matches: VectorMatch[] = [...vectors.entries()]
        .map(([id, stored]) => ({ id, score: similarity(metric, vector, stored) }))
        .sort((a, b) => b.score - a.score)
        .slice(0, k);

      return Promise.resolve(matches);
    },

    remove(namespace: string, id: string): Promise<void> {
      const vectors = namespaces.get(namespace);
      vectors?.delete(id);
      if (vectors?.size === 0) {
        namespaces.delete(namespace);
      }
      return Promise.resolve();
    },
  };
}

export function createInMemoryCacheBackend(): CacheBackend {
  return {
    keyValue: createInMemoryKeyValueStore(),
    vectorIndex: createInMemoryVectorIndex(),
  };
}
