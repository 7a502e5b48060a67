import { createChildLogger } from '@triangulate/shared/src/logger.js';
import { toError } from '@triangulate/shared/src/utils/errors.js';
import type { WebSearchClient, WebSearchOptions, WebSearchResult } from './types.js';

const log = createChildLogger('web-search:mock');

export interface MockWebSearchResponse {
  readonly content: string;
  readonly sourceUrls: readonly string[];
}

export function createMockWebSearchClient(
  responses?: ReadonlyMap<string, MockWebSearchResponse>,
): WebSearchClient {
  log.info('Using mock web search client');

  return {
    search(query: string, options: WebSearchOptions = {}): Promise<WebSearchResult> {
      log.debug({ query }, 'Mock web search');
      if (options.signal?.aborted) {
        return Promise.reject(toError(options.signal.reason));
      }

      const response = responses?.get(query) ?? {
        content: `Mock search findings about ${query}.`,
        sourceUrls: ['https://example.com/source1', 'https://example.com/source2'],
      };
      return Promise.resolve({
        query,
        content: response.content,
        sourceUrls: response.sourceUrls,
      });
    },
  };
}
