export const EMBEDDING_DIMENSION = 768;
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-005';

/**
 * Maps text to fixed-length vectors. Every vector an implementation returns has
 * exactly `dimension` components; failures surface as EmbeddingUnavailableError.
 */
export interface EmbeddingClient {
  readonly dimension: number;
  generateEmbedding(text: string): Promise<number[]>;
  generateEmbeddings(texts: string[]): Promise<number[][]>;
}
