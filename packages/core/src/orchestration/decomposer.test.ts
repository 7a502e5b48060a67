import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_CAPABILITY_KEYWORDS } from '@triangulate/schemas/src/research-config.schema.js';
import type { QueryHints, ResearchQuery } from '@triangulate/shared/src/types/research.types.js';
import { LlmError } from '@triangulate/shared/src/utils/errors.js';
import type { LlmClient } from '../llm/llm-client.js';
import type { DecomposerConfig } from './decomposer.js';
import { createDecomposer, matchCapabilities } from './decomposer.js';

const config: DecomposerConfig = {
  decomposition: { useLlm: true, keywords: DEFAULT_CAPABILITY_KEYWORDS },
  defaultCapabilities: ['web', 'academic'],
};

function makeQuery(text: string, hints: QueryHints = {}): ResearchQuery {
  return { id: 'q-1', text, hints, submittedAt: new Date('2026-01-01T00:00:00.000Z') };
}

function llmReturning(payload: unknown): LlmClient {
  return { invoke: vi.fn().mockResolvedValue({ content: JSON.stringify(payload) }) };
}

describe('matchCapabilities', () => {
  it('should match every capability whose keywords appear', () => {
    expect(
      matchCapabilities('Recent papers on video compression', DEFAULT_CAPABILITY_KEYWORDS),
    ).toEqual(['web', 'academic', 'multimodal']);
  });

  it('should ignore substrings of longer words', () => {
    expect(matchCapabilities('Newsletters about imagery', DEFAULT_CAPABILITY_KEYWORDS)).toEqual([]);
  });

  it('should match multi-word keywords as phrases', () => {
    const keywords = { web: ['stock price'], academic: [], multimodal: [] };
    expect(matchCapabilities('What moved the Stock Price of ACME?', keywords)).toEqual(['web']);
  });
});

describe('createDecomposer', () => {
  it('should use hinted capabilities without asking the LLM', async () => {
    const llmClient = llmReturning({ subtasks: [{ capability: 'web', text: 'unused' }] });
    const decomposer = createDecomposer({ llmClient }, config);

    const decomposition = await decomposer.decompose(
      makeQuery('Battery recycling rates', { capabilities: ['academic', 'academic', 'web'] }),
    );

    expect(decomposition.strategy).toBe('hints');
    expect(decomposition.subtasks).toEqual([
      {
        id: 'q-1-1',
        queryId: 'q-1',
        capability: 'academic',
        text: 'Battery recycling rates',
        purpose: 'research',
      },
      {
        id: 'q-1-2',
        queryId: 'q-1',
        capability: 'web',
        text: 'Battery recycling rates',
        purpose: 'research',
      },
    ]);
    expect(llmClient.invoke).not.toHaveBeenCalled();
  });

  it('should take subtasks proposed by the LLM', async () => {
    const llmClient = llmReturning({
      subtasks: [
        { capability: 'web', text: 'Current lithium spot price' },
        { capability: 'academic', text: 'Studies on lithium supply elasticity' },
      ],
      reasoning: 'Price is recent data, elasticity is studied.',
    });
    const decomposer = createDecomposer({ llmClient }, config);

    const decomposition = await decomposer.decompose(makeQuery('Lithium market outlook'));

    expect(decomposition.strategy).toBe('llm');
    expect(decomposition.subtasks.map((s) => [s.capability, s.text])).toEqual([
      ['web', 'Current lithium spot price'],
      ['academic', 'Studies on lithium supply elasticity'],
    ]);
    expect(vi.mocked(llmClient.invoke).mock.calls[0]?.[0].userMessage).toBe(
      'Query: Lithium market outlook',
    );
  });

  it('should fall back to keywords when the LLM fails', async () => {
    const llmClient: LlmClient = {
      invoke: vi.fn().mockRejectedValue(new LlmError('quota exceeded', false)),
    };
    const decomposer = createDecomposer({ llmClient }, config);

    const decomposition = await decomposer.decompose(makeQuery('Latest news on fusion startups'));

    expect(decomposition.strategy).toBe('keywords');
    expect(decomposition.subtasks.map((s) => s.capability)).toEqual(['web']);
  });

  it('should not call the LLM when disabled in config', async () => {
    const llmClient = llmReturning({ subtasks: [{ capability: 'web', text: 'unused' }] });
    const decomposer = createDecomposer(
      { llmClient },
      { ...config, decomposition: { ...config.decomposition, useLlm: false } },
    );

    const decomposition = await decomposer.decompose(makeQuery('A peer-reviewed survey of sleep'));

    expect(decomposition.strategy).toBe('keywords');
    expect(decomposition.subtasks.map((s) => s.capability)).toEqual(['academic']);
    expect(llmClient.invoke).not.toHaveBeenCalled();
  });

  it('should use the default capabilities when no keyword matches', async () => {
    const decomposer = createDecomposer({}, config);

    const decomposition = await decomposer.decompose(makeQuery('How tall is Mount Kenya?'));

    expect(decomposition.strategy).toBe('keywords');
    expect(decomposition.subtasks.map((s) => s.capability)).toEqual(['web', 'academic']);
  });

  it('should append the domain hint to every subtask', async () => {
    const decomposer = createDecomposer({}, config);

    const decomposition = await decomposer.decompose(
      makeQuery('Grid storage costs', { domain: 'energy' }),
    );

    expect(decomposition.subtasks.map((s) => s.text)).toEqual([
      'Grid storage costs [domain: energy]',
      'Grid storage costs [domain: energy]',
    ]);
  });

  it('should add a multimodal subtask carrying the media when none was planned', async () => {
    const decomposer = createDecomposer({}, config);

    const decomposition = await decomposer.decompose(
      makeQuery('Latest coral bleaching extent', {
        mediaUris: ['gs://bucket/reef.jpg'],
      }),
    );

    expect(decomposition.subtasks.map((s) => [s.capability, s.mediaUris])).toEqual([
      ['web', undefined],
      ['multimodal', ['gs://bucket/reef.jpg']],
    ]);
  });

  it('should not add capabilities beyond explicit hints', async () => {
    const decomposer = createDecomposer({}, config);

    const decomposition = await decomposer.decompose(
      makeQuery('Coral bleaching', { capabilities: ['web'], mediaUris: ['gs://bucket/reef.jpg'] }),
    );

    expect(decomposition.subtasks.map((s) => s.capability)).toEqual(['web']);
  });
});
