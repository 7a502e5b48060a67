import { randomUUID } from 'node:crypto';
import type { CacheConfig } from '@triangulate/schemas/src/research-config.schema.js';
import type {
  CachedResult,
  CacheEntry,
  CachePayload,
} from '@triangulate/shared/src/types/cache.types.js';
import { toError } from '@triangulate/shared/src/utils/errors.js';
import { createChildLogger } from '@triangulate/shared/src/logger.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';
import { buildEmbeddingText, normalizeText } from '../embedding/embedding-text-builder.js';
import type { CacheBackend } from '../repositories/cache-store.repository.js';
import { parseCacheEntry, serializeCacheEntry } from './cache-entry.schema.js';

const log = createChildLogger('cache:memory');

export const DEFAULT_CACHE_SCOPE = 'default';

const MAX_EVICTION_ROUNDS = 10;

export interface MemoryCacheDeps {
  readonly embeddingClient: EmbeddingClient;
  readonly backend: CacheBackend;
}

export interface MemoryCache {
  lookup(queryText: string, scope?: string): Promise<CachedResult | null>;
  /** Writes a new entry; returns null when the store was skipped. */
  store(queryText: string, payload: CachePayload, scope?: string): Promise<CacheEntry | null>;
}

export function entryKey(scope: string, id: string): string {
  return `cache:${scope}:${id}`;
}

function errorContext(error: unknown): Record<string, unknown> {
  const err = toError(error);
  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  return { error: err.message, code };
}

export function createMemoryCache(deps: MemoryCacheDeps, config: CacheConfig): MemoryCache {
  const { embeddingClient, backend } = deps;

  async function embed(queryText: string): Promise<readonly number[] | null> {
    const embedding = await embeddingClient.generateEmbedding(buildEmbeddingText(queryText));
    if (embedding.length !== embeddingClient.dimension) {
      log.warn(
        { expected: embeddingClient.dimension, actual: embedding.length },
        'Embedding dimension mismatch',
      );
      return null;
    }
    return embedding;
  }

  /** Reads one neighbour's entry; null when the entry is gone, expired or unusable. */
  async function readCandidate(
    scope: string,
    id: string,
    score: number,
    normalizedQuery: string,
    now: number,
  ): Promise<CachedResult | null> {
    const raw = await backend.keyValue.get(entryKey(scope, id));
    if (raw === null) {
      return null;
    }

    const entry = parseCacheEntry(raw);
    if (!entry) {
      log.warn({ scope, id }, 'Discarding malformed cache entry');
      return null;
    }

    if (entry.queryEmbedding.length !== embeddingClient.dimension) {
      return null;
    }

    if (now - entry.createdAt.getTime() > entry.ttlMs) {
      return null;
    }

    const similarity = normalizeText(entry.queryText) === normalizedQuery ? 1 : score;
    return { entry, similarity };
  }

  async function evict(scope: string, ids: readonly string[]): Promise<void> {
    await Promise.all(
      ids.map(async (id) => {
        await backend.vectorIndex.remove(scope, id);
        await backend.keyValue.expire(entryKey(scope, id), 0);
      }),
    );
    log.debug({ scope, evicted: ids.length }, 'Evicted stale cache entries');
  }

  return {
    async lookup(queryText: string, scope = DEFAULT_CACHE_SCOPE): Promise<CachedResult | null> {
      try {
        const embedding = await embed(queryText);
        if (!embedding) {
          return null;
        }

        const now = Date.now();
        const normalizedQuery = normalizeText(queryText);
        let neighbours = 0;
        let live: CachedResult[] = [];

        // Evict stale neighbours and search again until the window holds only live entries.
        for (let round = 0; round < MAX_EVICTION_ROUNDS; round++) {
          const matches = await backend.vectorIndex.nearest(
            scope,
            config.maxCandidates,
            embedding,
            config.metric,
          );
          neighbours = matches.length;

          const reads = await Promise.all(
            matches
              .filter((match) => match.score >= config.threshold)
              .map(async (match) => ({
                id: match.id,
                result: await readCandidate(scope, match.id, match.score, normalizedQuery, now),
              })),
          );

          live = reads.flatMap((read) => (read.result ? [read.result] : []));
          const stale = reads.filter((read) => read.result === null).map((read) => read.id);
          if (stale.length === 0) {
            break;
          }
          await evict(scope, stale);
        }

        const best = live.sort(
          (a, b) =>
            b.similarity - a.similarity ||
            b.entry.createdAt.getTime() - a.entry.createdAt.getTime(),
        )[0];

        if (!best) {
          log.debug({ scope, neighbours }, 'Cache miss');
          return null;
        }

        log.info(
          { scope, entryId: best.entry.id, similarity: best.similarity },
          'Cache hit',
        );
        return best;
      } catch (error) {
        log.warn({ scope, ...errorContext(error) }, 'Cache lookup failed, treating as miss');
        return null;
      }
    },

    async store(
      queryText: string,
      payload: CachePayload,
      scope = DEFAULT_CACHE_SCOPE,
    ): Promise<CacheEntry | null> {
      try {
        const embedding = await embed(queryText);
        if (!embedding) {
          return null;
        }

        const entry: CacheEntry = {
          id: randomUUID(),
          scope,
          queryText,
          queryEmbedding: embedding,
          payload,
          createdAt: new Date(),
          ttlMs: config.ttlMs,
        };

        await backend.keyValue.set(entryKey(scope, entry.id), serializeCacheEntry(entry), config.ttlMs);
        await backend.vectorIndex.upsert(scope, entry.id, embedding);

        log.info({ scope, entryId: entry.id, kind: payload.kind }, 'Cache entry stored');
        return entry;
      } catch (error) {
        log.warn({ scope, ...errorContext(error) }, 'Cache store failed, skipping');
        return null;
      }
    },
  };
}
