import type { LlmClient } from '../llm/llm-client.js';
import type { MediaAnalysisClient } from '../services/media-analysis/types.js';
import type { WebSearchClient } from '../services/web-search/types.js';
import { createLlmResearchAgent } from './llm-research-agent.js';
import type { ResearchAgent } from './research-agent.js';
import {
  ACADEMIC_SEARCH_CONTEXT,
  WEB_SEARCH_CONTEXT,
  createMultimodalSource,
  createSearchSource,
} from './research-sources.js';

export interface ResearchAgentDeps {
  readonly llmClient: LlmClient;
  readonly searchClient: WebSearchClient;
  readonly mediaClient: MediaAnalysisClient;
}

/** One agent per capability: web, academic and multimodal. */
export function createResearchAgents(deps: ResearchAgentDeps): ResearchAgent[] {
  const { llmClient, searchClient, mediaClient } = deps;

  return [
    createLlmResearchAgent({
      id: 'web-agent',
      capability: 'web',
      source: createSearchSource(searchClient, WEB_SEARCH_CONTEXT),
      llmClient,
    }),
    createLlmResearchAgent({
      id: 'academic-agent',
      capability: 'academic',
      source: createSearchSource(searchClient, ACADEMIC_SEARCH_CONTEXT),
      llmClient,
    }),
    createLlmResearchAgent({
      id: 'multimodal-agent',
      capability: 'multimodal',
      source: createMultimodalSource(mediaClient, searchClient),
      llmClient,
    }),
  ];
}
