import type { EmbeddingClient } from './embedding-client.js';
import { EMBEDDING_DIMENSION } from './embedding-client.js';

function hashCode(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = ((hash << 5) - hash + char) | 0;
  }
  return hash;
}

function generateDeterministicVector(text: string, dimension: number): number[] {
  const seed = hashCode(text);
  const vector: number[] = new Array<number>(dimension).fill(0);
  for (let i = 0; i < dimension; i++) {
    // Centered around zero so unrelated texts land near orthogonal
    const x = Math.sin(seed * (i + 1)) * 10000;
    vector[i] = x - Math.floor(x) - 0.5;
  }

  // Normalize to unit vector
  const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (magnitude > 0) {
    for (let i = 0; i < dimension; i++) {
      vector[i] = vector[i] / magnitude;
    }
  }

  return vector;
}

export function createMockEmbeddingClient(dimension: number = EMBEDDING_DIMENSION): EmbeddingClient {
  return {
    dimension,

    generateEmbedding(text: string): Promise<number[]> {
      return Promise.resolve(generateDeterministicVector(text, dimension));
    },

    generateEmbeddings(texts: string[]): Promise<number[][]> {
      return Promise.resolve(texts.map((t) => generateDeterministicVector(t, dimension)));
    },
  };
}
