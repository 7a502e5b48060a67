import { describe, it, expect } from 'vitest';
import { createMockWebSearchClient } from './mock-web-search-client.js';
import type { MockWebSearchResponse } from './mock-web-search-client.js';
import { buildSearchPrompt, extractSourceUrls } from './web-search-client.js';

describe('extractSourceUrls', () => {
  it('should collect unique grounding urls across candidates', () => {
    const urls = extractSourceUrls({
      candidates: [
        {
          groundingMetadata: {
            groundingChunks: [
              { web: { uri: 'https://a.example' } },
              { web: {} },
              { web: { uri: 'https://b.example' } },
            ],
          },
        },
        { groundingMetadata: { groundingChunks: [{ web: { uri: 'https://a.example' } }] } },
        {},
      ],
    });

    expect(urls).toEqual(['https://a.example', 'https://b.example']);
  });

  it('should return an empty list without candidates', () => {
    expect(extractSourceUrls({ text: 'plain answer' })).toEqual([]);
  });
});

describe('buildSearchPrompt', () => {
  it('should put the system context ahead of the task', () => {
    expect(buildSearchPrompt('perovskite cells', 'Focus on journals.')).toBe(
      'Focus on journals.\n\nResearch the following topic and report concrete, checkable findings with their sources:\nperovskite cells',
    );
  });
});

describe('MockWebSearchClient', () => {
  it('should echo the query in its default response', async () => {
    const client = createMockWebSearchClient();
    const result = await client.search('tidal energy output');

    expect(result).toEqual({
      query: 'tidal energy output',
      content: 'Mock search findings about tidal energy output.',
      sourceUrls: ['https://example.com/source1', 'https://example.com/source2'],
    });
  });

  it('should return configured responses for known queries', async () => {
    const responses = new Map<string, MockWebSearchResponse>([
      ['tidal energy output', { content: 'Specific result', sourceUrls: ['https://tides.example'] }],
    ]);

    const result = await createMockWebSearchClient(responses).search('tidal energy output');

    expect(result.content).toBe('Specific result');
    expect(result.sourceUrls).toEqual(['https://tides.example']);
  });

  it('should reject once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('deadline'));

    await expect(
      createMockWebSearchClient().search('anything', { signal: controller.signal }),
    ).rejects.toThrow('deadline');
  });
});
