import { createChildLogger } from '@triangulate/shared/src/logger.js';
import { toError } from '@triangulate/shared/src/utils/errors.js';
import type { MediaAnalysisClient, MediaAnalysisRequest, MediaAnalysisResult } from './types.js';

const log = createChildLogger('media-analysis:mock');

export function createMockMediaAnalysisClient(): MediaAnalysisClient {
  log.info('Using mock media analysis client');

  return {
    analyze(request: MediaAnalysisRequest): Promise<MediaAnalysisResult> {
      if (request.signal?.aborted) {
        return Promise.reject(toError(request.signal.reason));
      }

      return Promise.resolve({
        content: `Mock analysis of ${String(request.mediaUris.length)} media item(s).`,
        sourceUrls: [...request.mediaUris],
      });
    },
  };
}
