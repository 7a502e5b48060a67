import { describe, it, expect, vi } from 'vitest';
import type { Subtask } from '@triangulate/shared/src/types/research.types.js';
import type {
  MediaAnalysisClient,
  MediaAnalysisRequest,
} from '../services/media-analysis/types.js';
import type { WebSearchClient } from '../services/web-search/types.js';
import {
  ACADEMIC_SEARCH_CONTEXT,
  MULTIMODAL_SEARCH_CONTEXT,
  createMultimodalSource,
  createSearchSource,
} from './research-sources.js';

function makeSubtask(overrides: Partial<Subtask> = {}): Subtask {
  return {
    id: 'subtask-1',
    queryId: 'query-1',
    capability: 'multimodal',
    text: 'How glaciers retreat',
    purpose: 'research',
    ...overrides,
  };
}

function searchClient(): WebSearchClient {
  return {
    search: vi.fn((query: string) =>
      Promise.resolve({ query, content: `found: ${query}`, sourceUrls: ['https://search.example'] }),
    ),
  };
}

function mediaClient(): MediaAnalysisClient {
  return {
    analyze: vi.fn((request: MediaAnalysisRequest) =>
      Promise.resolve({ content: 'a timelapse of ice loss', sourceUrls: [...request.mediaUris] }),
    ),
  };
}

describe('createSearchSource', () => {
  it('should search the subtask text with its system context and signal', async () => {
    const client = searchClient();
    const signal = new AbortController().signal;

    const material = await createSearchSource(client, ACADEMIC_SEARCH_CONTEXT).gather(
      makeSubtask({ capability: 'academic' }),
      signal,
    );

    expect(material).toEqual({
      content: 'found: How glaciers retreat',
      sourceUrls: ['https://search.example'],
    });
    expect(client.search).toHaveBeenCalledWith('How glaciers retreat', {
      systemContext: ACADEMIC_SEARCH_CONTEXT,
      signal,
    });
  });
});

describe('createMultimodalSource', () => {
  it('should analyse attached media', async () => {
    const media = mediaClient();
    const search = searchClient();

    const material = await createMultimodalSource(media, search).gather(
      makeSubtask({ mediaUris: ['gs://bucket/glacier.mp4'] }),
      new AbortController().signal,
    );

    expect(material).toEqual({
      content: 'a timelapse of ice loss',
      sourceUrls: ['gs://bucket/glacier.mp4'],
    });
    expect(search.search).not.toHaveBeenCalled();
  });

  it('should fall back to searching for visual material without media', async () => {
    const media = mediaClient();
    const search = searchClient();

    await createMultimodalSource(media, search).gather(makeSubtask(), new AbortController().signal);

    expect(media.analyze).not.toHaveBeenCalled();
    expect(search.search).toHaveBeenCalledWith(
      'How glaciers retreat',
      expect.objectContaining({ systemContext: MULTIMODAL_SEARCH_CONTEXT }),
    );
  });
});
