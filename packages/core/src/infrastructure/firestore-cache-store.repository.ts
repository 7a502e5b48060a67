import { createHash } from 'node:crypto';
import type { DocumentData, Firestore } from '@google-cloud/firestore';
import { FieldValue, Timestamp } from '@google-cloud/firestore';
import { CacheBackendUnavailableError, toError } from '@triangulate/shared/src/utils/errors.js';
import type { SimilarityMetric } from '@triangulate/shared/src/utils/math.js';
import { createChildLogger } from '@triangulate/shared/src/logger.js';
import type {
  CacheBackend,
  KeyValueStore,
  VectorIndex,
  VectorMatch,
} from '../repositories/cache-store.repository.js';

const log = createChildLogger('firestore:cache-store');

export const ENTRY_COLLECTION = 'cache-entries';
export const VECTOR_COLLECTION = 'cache-vectors';

const DISTANCE_FIELD = '__distance';

interface EntryDocument {
  key: string;
  value: string;
  expiresAt: Timestamp | null;
}

function hashKey(key: string): string {
  return createHash('sha256').update(key).digest('hex');
}

function vectorDocId(namespace: string, id: string): string {
  return hashKey(`${namespace}\u0000${id}`);
}

function readEntry(data: DocumentData | undefined): EntryDocument | null {
  if (!data) {
    return null;
  }
  const value: unknown = data['value'];
  const key: unknown = data['key'];
  const expiresAt: unknown = data['expiresAt'];
  if (typeof value !== 'string' || typeof key !== 'string') {
    return null;
  }
  return {
    key,
    value,
    expiresAt: expiresAt instanceof Timestamp ? expiresAt : null,
  };
}

function toScore(metric: SimilarityMetric, distance: unknown): number {
  if (typeof distance !== 'number') {
    return 0;
  }
  // COSINE distance in Firestore: 0 = identical, 2 = opposite.
  // DOT_PRODUCT reports the product itself, larger is closer.
  return metric === 'cosine' ? 1 - distance : distance;
}

async function wrap<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new CacheBackendUnavailableError(
      `Firestore cache ${operation} failed: ${toError(error).message}`,
      toError(error),
    );
  }
}

export function createFirestoreKeyValueStore(db: Firestore): KeyValueStore {
  const collectionRef = db.collection(ENTRY_COLLECTION);

  return {
    get(key: string): Promise<string | null> {
      return wrap('get', async () => {
        const doc = await collectionRef.doc(hashKey(key)).get();
        const entry = readEntry(doc.data());
        if (!entry) {
          return null;
        }

        if (entry.expiresAt && entry.expiresAt.toMillis() <= Date.now()) {
          log.debug({ key }, 'Cache entry expired');
          return null;
        }

        return entry.value;
      });
    },

    set(key: string, value: string, ttlMs?: number): Promise<void> {
      return wrap('set', async () => {
        const docData: EntryDocument = {
          key,
          value,
          expiresAt: ttlMs !== undefined ? Timestamp.fromMillis(Date.now() + ttlMs) : null,
        };
        await collectionRef.doc(hashKey(key)).set(docData);
      });
    },

    expire(key: string, ttlMs: number): Promise<void> {
      return wrap('expire', async () => {
        const docRef = collectionRef.doc(hashKey(key));
        if (ttlMs <= 0) {
          await docRef.delete();
          return;
        }

        const doc = await docRef.get();
        if (!doc.exists) {
          return;
        }
        await docRef.update({ expiresAt: Timestamp.fromMillis(Date.now() + ttlMs) });
      });
    },
  };
}

export function createFirestoreVectorIndex(db: Firestore): VectorIndex {
  const collectionRef = db.collection(VECTOR_COLLECTION);

  return {
    upsert(namespace: string, id: string, vector: readonly number[]): Promise<void> {
      return wrap('upsert', async () => {
        await collectionRef.doc(vectorDocId(namespace, id)).set({
          namespace,
          entryId: id,
          embedding: FieldValue.vector([...vector]),
        });
      });
    },

    nearest(
      namespace: string,
      k: number,
      vector: readonly number[],
      metric: SimilarityMetric,
    ): Promise<readonly VectorMatch[]> {
      return wrap('nearest', async () => {
        const snapshot = await collectionRef
          .where('namespace', '==', namespace)
          .findNearest({
            vectorField: 'embedding',
            queryVector: [...vector],
            limit: k,
            distanceMeasure: metric === 'cosine' ? 'COSINE' : 'DOT_PRODUCT',
            distanceResultField: DISTANCE_FIELD,
          })
          .get();

        const matches: VectorMatch[] = [];
        for (const doc of snapshot.docs) {
          const data = doc.data();
          const entryId: unknown = data['entryId'];
          if (typeof entryId !== 'string') {
            continue;
          }
          matches.push({ id: entryId, score: toScore(metric, data[DISTANCE_FIELD]) });
        }

        log.debug({ namespace, candidates: matches.length }, 'Vector neighbours fetched');
        return matches.sort((a, b) => b.score - a.score);
      });
    },

    remove(namespace: string, id: string): Promise<void> {
      return wrap('remove', async () => {
        await collectionRef.doc(vectorDocId(namespace, id)).delete();
      });
    },
  };
}

export function createFirestoreCacheBackend(db: Firestore): CacheBackend {
  return {
    keyValue: createFirestoreKeyValueStore(db),
    vectorIndex: createFirestoreVectorIndex(db),
  };
}
