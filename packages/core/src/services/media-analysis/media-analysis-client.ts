import type { Part } from '@google/genai';
import { createChildLogger } from '@triangulate/shared/src/logger.js';
import { ConfigurationError } from '@triangulate/shared/src/utils/errors.js';
import { withTransientRetry } from '../../llm/transient-retry.js';
import type { MediaAnalysisClient, MediaAnalysisRequest, MediaAnalysisResult } from './types.js';

const log = createChildLogger('media-analysis:client');

const MEDIA_MODEL = 'gemini-2.0-flash';

const MIME_TYPES: Readonly<Record<string, string>> = {
  mp4: 'video/mp4',
  mov: 'video/quicktime',
  webm: 'video/webm',
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  m4a: 'audio/mp4',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  pdf: 'application/pdf',
};

export interface MediaAnalysisClientConfig {
  readonly projectId: string;
  readonly location: string;
}

/** MIME type from the URI's file extension; undefined for hosted video pages. */
export function inferMimeType(uri: string): string | undefined {
  const path = uri.split(/[?#]/)[0] ?? uri;
  const extension = /\.([a-z0-9]+)$/i.exec(path)?.[1]?.toLowerCase();
  return extension ? MIME_TYPES[extension] : undefined;
}

export function buildMediaParts(request: MediaAnalysisRequest): Part[] {
  const mediaParts: Part[] = request.mediaUris.map((fileUri) => {
    const mimeType = inferMimeType(fileUri);
    return { fileData: mimeType ? { fileUri, mimeType } : { fileUri } };
  });
  return [...mediaParts, { text: request.prompt }];
}

/** Sends media by URI to Gemini on Vertex AI and returns its written analysis. */
export function createMediaAnalysisClient(config: MediaAnalysisClientConfig): MediaAnalysisClient {
  const { projectId, location } = config;

  if (!projectId) {
    throw new ConfigurationError('Project ID is required for MediaAnalysisClient');
  }

  log.info({ projectId, location }, 'Creating media analysis client');

  return {
    async analyze(request: MediaAnalysisRequest): Promise<MediaAnalysisResult> {
      log.debug({ mediaCount: request.mediaUris.length }, 'Analyzing media');

      const { GoogleGenAI } = await import('@google/genai');
      const client = new GoogleGenAI({ vertexai: true, project: projectId, location });

      return withTransientRetry(
        'Media analysis',
        async () => {
          const response = await client.models.generateContent({
            model: MEDIA_MODEL,
            contents: [{ role: 'user', parts: buildMediaParts(request) }],
            config: { abortSignal: request.signal },
          });

          return { content: response.text ?? '', sourceUrls: [...request.mediaUris] };
        },
        { signal: request.signal },
      );
    },
  };
}
