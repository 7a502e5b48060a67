import { describe, it, expect } from 'vitest';
import { createMockEmbeddingClient } from './mock-embedding-client.js';
import { EMBEDDING_DIMENSION } from './embedding-client.js';
import { buildEmbeddingText, normalizeText } from './embedding-text-builder.js';
import { cosineSimilarity } from '@triangulate/shared/src/utils/math.js';

describe('MockEmbeddingClient', () => {
  it('should generate embedding with the default dimension', async () => {
    const client = createMockEmbeddingClient();
    const embedding = await client.generateEmbedding('test input');

    expect(client.dimension).toBe(EMBEDDING_DIMENSION);
    expect(embedding).toHaveLength(EMBEDDING_DIMENSION);
  });

  it('should honour a custom dimension', async () => {
    const client = createMockEmbeddingClient(16);
    const embedding = await client.generateEmbedding('test input');

    expect(client.dimension).toBe(16);
    expect(embedding).toHaveLength(16);
  });

  it('should generate deterministic embeddings for same input', async () => {
    const client = createMockEmbeddingClient();
    const e1 = await client.generateEmbedding('test input');
    const e2 = await client.generateEmbedding('test input');

    expect(e1).toEqual(e2);
  });

  it('should generate nearly orthogonal embeddings for unrelated inputs', async () => {
    const client = createMockEmbeddingClient();
    const e1 = await client.generateEmbedding('transformer attention');
    const e2 = await client.generateEmbedding('river sediment');

    expect(e1).not.toEqual(e2);
    expect(Math.abs(cosineSimilarity(e1, e2))).toBeLessThan(0.3);
  });

  it('should generate batch embeddings with correct count', async () => {
    const client = createMockEmbeddingClient();
    const results = await client.generateEmbeddings(['a', 'b', 'c']);

    expect(results).toHaveLength(3);
    for (const r of results) {
      expect(r).toHaveLength(EMBEDDING_DIMENSION);
    }
  });

  it('should generate normalized unit vectors', async () => {
    const client = createMockEmbeddingClient();
    const embedding = await client.generateEmbedding('test');

    const magnitude = Math.sqrt(embedding.reduce((sum, v) => sum + v * v, 0));
    expect(magnitude).toBeCloseTo(1.0, 5);
  });
});

describe('normalizeText', () => {
  it('should lowercase, trim and collapse whitespace', () => {
    expect(normalizeText('  Papers on\n Transformer   Attention ')).toBe(
      'papers on transformer attention',
    );
  });
});

describe('buildEmbeddingText', () => {
  it('should drop trailing punctuation after normalizing', () => {
    expect(buildEmbeddingText('Inflation rate in 2023.')).toBe('inflation rate in 2023');
  });

  it('should keep inner punctuation', () => {
    expect(buildEmbeddingText('U.S. inflation: rate')).toBe('u.s. inflation: rate');
  });
});
