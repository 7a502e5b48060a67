import type { Subtask } from '@triangulate/shared/src/types/research.types.js';
import type { MediaAnalysisClient } from '../services/media-analysis/types.js';
import type { WebSearchClient } from '../services/web-search/types.js';

export interface SourceMaterial {
  readonly content: string;
  readonly sourceUrls: readonly string[];
}

/** Where an agent gathers raw material before claims are extracted from it. */
export interface ResearchSource {
  gather(subtask: Subtask, signal: AbortSignal): Promise<SourceMaterial>;
}

export const WEB_SEARCH_CONTEXT =
  'You are a web research assistant. Prefer recent news, official statistics and primary sources. Include publication dates where known.';

export const ACADEMIC_SEARCH_CONTEXT =
  'You are an academic research assistant. Restrict yourself to peer-reviewed papers, preprints (arXiv, bioRxiv, SSRN) and conference proceedings. Name authors, venue and year for every finding.';

export const MULTIMODAL_SEARCH_CONTEXT =
  'You are a media research assistant. Look for findings presented in videos, lectures, podcasts, charts and images, and describe what they show.';

export function createSearchSource(searchClient: WebSearchClient, systemContext: string): ResearchSource {
  return {
    async gather(subtask: Subtask, signal: AbortSignal): Promise<SourceMaterial> {
      const result = await searchClient.search(subtask.text, { systemContext, signal });
      return { content: result.content, sourceUrls: result.sourceUrls };
    },
  };
}

/** Analyses the subtask's media when it has any; otherwise searches for visual material. */
export function createMultimodalSource(
  mediaClient: MediaAnalysisClient,
  searchClient: WebSearchClient,
): ResearchSource {
  const fallback = createSearchSource(searchClient, MULTIMODAL_SEARCH_CONTEXT);

  return {
    async gather(subtask: Subtask, signal: AbortSignal): Promise<SourceMaterial> {
      const mediaUris = subtask.mediaUris ?? [];
      if (mediaUris.length === 0) {
        return fallback.gather(subtask, signal);
      }

      const result = await mediaClient.analyze({
        prompt: `Analyse the attached media for this research task and report concrete findings:\n${subtask.text}`,
        mediaUris,
        signal,
      });
      return { content: result.content, sourceUrls: result.sourceUrls };
    },
  };
}
