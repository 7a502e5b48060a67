import { vi } from 'vitest';
import type { AgentResult, Capability } from '@triangulate/shared/src/types/research.types.js';
import { EmbeddingUnavailableError } from '@triangulate/shared/src/utils/errors.js';
import type { EmbeddingClient } from './embedding/embedding-client.js';

/**
 * Embedding client backed by a fixed lookup table. Unknown texts fail with
 * EmbeddingUnavailableError unless a fallback vector is given.
 */
export function createStubEmbeddingClient(
  vectors: Readonly<Record<string, number[]>>,
  options: { dimension?: number; fallback?: (text: string) => number[] } = {},
): EmbeddingClient {
  const dimension = options.dimension ?? 3;

  function lookup(text: string): number[] {
    const vector = vectors[text] ?? options.fallback?.(text);
    if (!vector) {
      throw new EmbeddingUnavailableError(`No stub vector for "${text}"`);
    }
    return vector;
  }

  return {
    dimension,
    generateEmbedding: vi.fn((text: string) => {
      try {
        return Promise.resolve(lookup(text));
      } catch (error) {
        return Promise.reject(error);
      }
    }),
    generateEmbeddings: vi.fn((texts: string[]) => {
      try {
        return Promise.resolve(texts.map(lookup));
      } catch (error) {
        return Promise.reject(error);
      }
    }),
  };
}

export function createFailingEmbeddingClient(dimension = 3): EmbeddingClient {
  return {
    dimension,
    generateEmbedding: vi.fn(() =>
      Promise.reject(new EmbeddingUnavailableError('embedding service down')),
    ),
    generateEmbeddings: vi.fn(() =>
      Promise.reject(new EmbeddingUnavailableError('embedding service down')),
    ),
  };
}

export function makeAgentResult(overrides: Partial<AgentResult> = {}): AgentResult {
  const capability: Capability = overrides.capability ?? 'web';
  return {
    agentId: overrides.agentId ?? `${capability}-agent`,
    capability,
    subtaskId: overrides.subtaskId ?? 'subtask-1',
    claims: overrides.claims ?? [],
    summary: overrides.summary ?? `Summary from ${capability}`,
    sourceUrls: overrides.sourceUrls ?? [],
    timestamp: overrides.timestamp ?? new Date('2026-01-01T00:00:00.000Z'),
  };
}
