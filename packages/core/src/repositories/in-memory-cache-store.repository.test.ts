import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  createInMemoryKeyValueStore,
  createInMemoryVectorIndex,
} from './in-memory-cache-store.repository.js';

describe('InMemoryKeyValueStore', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return null for a missing key', async () => {
    const store = createInMemoryKeyValueStore();
    expect(await store.get('missing')).toBeNull();
  });

  it('should store and retrieve a value without ttl', async () => {
    const store = createInMemoryKeyValueStore();
    await store.set('key', 'value');
    expect(await store.get('key')).toBe('value');
  });

  it('should drop a value once its ttl has elapsed', async () => {
    const store = createInMemoryKeyValueStore();
    const now = Date.now();
    await store.set('key', 'value', 1000);

    vi.spyOn(Date, 'now').mockReturnValue(now + 1001);

    expect(await store.get('key')).toBeNull();
  });

  it('should extend a value with expire', async () => {
    const store = createInMemoryKeyValueStore();
    const now = Date.now();
    vi.spyOn(Date, 'now').mockReturnValue(now);
    await store.set('key', 'value', 1000);
    await store.expire('key', 5000);

    vi.spyOn(Date, 'now').mockReturnValue(now + 2000);

    expect(await store.get('key')).toBe('value');
  });

  it('should delete a value when expire is called with zero', async () => {
    const store = createInMemoryKeyValueStore();
    await store.set('key', 'value');
    await store.expire('key', 0);
    expect(await store.get('key')).toBeNull();
  });
});

describe('InMemoryVectorIndex', () => {
  it('should return an empty list for an unknown namespace', async () => {
    const index = createInMemoryVectorIndex();
    expect(await index.nearest('nothing', 3, [1, 0], 'cosine')).toEqual([]);
  });

  it('should rank matches by cosine similarity and honour k', async () => {
    const index = createInMemoryVectorIndex();
    await index.upsert('ns', 'same', [1, 0]);
    await index.upsert('ns', 'orthogonal', [0, 1]);
    await index.upsert('ns', 'opposite', [-1, 0]);

    const matches = await index.nearest('ns', 2, [2, 0], 'cosine');

    expect(matches).toEqual([
      { id: 'same', score: 1 },
      { id: 'orthogonal', score: 0 },
    ]);
  });

  it('should score with the raw dot product for the dot metric', async () => {
    const index = createInMemoryVectorIndex();
    await index.upsert('ns', 'a', [2, 0]);

    const matches = await index.nearest('ns', 1, [3, 0], 'dot');

    expect(matches).toEqual([{ id: 'a', score: 6 }]);
  });

  it('should keep namespaces apart', async () => {
    const index = createInMemoryVectorIndex();
    await index.upsert('web', 'a', [1, 0]);
    await index.upsert('academic', 'b', [1, 0]);

    const matches = await index.nearest('web', 5, [1, 0], 'cosine');

    expect(matches.map((m) => m.id)).toEqual(['a']);
  });

  it('should replace a vector on repeated upsert of the same id', async () => {
    const index = createInMemoryVectorIndex();
    await index.upsert('ns', 'a', [1, 0]);
    await index.upsert('ns', 'a', [0, 1]);

    const matches = await index.nearest('ns', 1, [0, 1], 'cosine');

    expect(matches).toEqual([{ id: 'a', score: 1 }]);
  });

  it('should forget a removed vector', async () => {
    const index = createInMemoryVectorIndex();
    await index.upsert('ns', 'a', [1, 0]);
    await index.upsert('ns', 'b', [0, 1]);

    await index.remove('ns', 'a');
    await index.remove('ns', 'missing');

    expect(await index.nearest('ns', 5, [1, 0], 'cosine')).toEqual([{ id: 'b', score: 0 }]);
  });
});
