import { createChildLogger } from '@triangulate/shared/src/logger.js';
import { ConfigurationError } from '@triangulate/shared/src/utils/errors.js';
import { withTransientRetry } from '../../llm/transient-retry.js';
import type { WebSearchClient, WebSearchOptions, WebSearchResult } from './types.js';

const log = createChildLogger('web-search:client');

const SEARCH_MODEL = 'gemini-2.0-flash';

export interface WebSearchClientConfig {
  readonly projectId: string;
  readonly location: string;
}

interface GroundingChunk {
  readonly web?: {
    readonly uri?: string;
  };
}

interface GroundingMetadata {
  readonly groundingChunks?: readonly GroundingChunk[];
}

interface GenAiCandidate {
  readonly groundingMetadata?: GroundingMetadata;
}

export interface GroundedResponse {
  readonly text?: string;
  readonly candidates?: readonly GenAiCandidate[];
}

export function extractSourceUrls(response: GroundedResponse): string[] {
  const urls: string[] = [];
  for (const candidate of response.candidates ?? []) {
    for (const chunk of candidate.groundingMetadata?.groundingChunks ?? []) {
      if (chunk.web?.uri) {
        urls.push(chunk.web.uri);
      }
    }
  }
  return [...new Set(urls)];
}

export function buildSearchPrompt(query: string, systemContext?: string): string {
  const task = `Research the following topic and report concrete, checkable findings with their sources:\n${query}`;
  return systemContext ? `${systemContext}\n\n${task}` : task;
}

/** Gemini with Google Search grounding on Vertex AI. */
export function createWebSearchClient(config: WebSearchClientConfig): WebSearchClient {
  const { projectId, location } = config;

  if (!projectId) {
    throw new ConfigurationError('Project ID is required for WebSearchClient');
  }

  log.info({ projectId, location }, 'Creating web search client');

  return {
    async search(query: string, options: WebSearchOptions = {}): Promise<WebSearchResult> {
      log.debug({ query }, 'Executing grounded search');

      const { GoogleGenAI } = await import('@google/genai');
      const client = new GoogleGenAI({ vertexai: true, project: projectId, location });

      return withTransientRetry(
        'Web search',
        async () => {
          const response = await client.models.generateContent({
            model: SEARCH_MODEL,
            contents: buildSearchPrompt(query, options.systemContext),
            config: {
              tools: [{ googleSearch: {} }],
              abortSignal: options.signal,
            },
          });

          const sourceUrls = extractSourceUrls(response);
          log.debug({ query, sourceCount: sourceUrls.length }, 'Grounded search completed');

          return { query, content: response.text ?? '', sourceUrls };
        },
        { signal: options.signal },
      );
    },
  };
}
