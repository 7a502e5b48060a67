import { z } from 'zod';
import type { EmbeddingClient } from './embedding-client.js';
import { EMBEDDING_DIMENSION, DEFAULT_EMBEDDING_MODEL } from './embedding-client.js';
import { helpers, v1 } from '@google-cloud/aiplatform';
import { createChildLogger } from '@triangulate/shared/src/logger.js';
import {
  ConfigurationError,
  EmbeddingUnavailableError,
} from '@triangulate/shared/src/utils/errors.js';

const log = createChildLogger('embedding:vertex');

const PredictionSchema = z.object({
  embeddings: z.object({
    values: z.array(z.number()),
  }),
});

export function createVertexEmbeddingClient(): EmbeddingClient {
  const projectId = process.env['TRIANGULATE_GCP_PROJECT_ID'] ?? process.env['GCP_PROJECT_ID'];
  const location = process.env['VERTEX_AI_LOCATION'] ?? 'europe-west1';
  const model = process.env['TRIANGULATE_EMBEDDING_MODEL'] ?? DEFAULT_EMBEDDING_MODEL;

  if (!projectId) {
    throw new ConfigurationError(
      'TRIANGULATE_GCP_PROJECT_ID environment variable is required for Vertex AI embedding client',
    );
  }

  const endpoint = `projects/${projectId}/locations/${location}/publishers/google/models/${model}`;

  log.info({ projectId, location, model }, 'Initializing Vertex AI embedding client');

  let clientInstance: v1.PredictionServiceClient | undefined;

  function getClient(): v1.PredictionServiceClient {
    if (!clientInstance) {
      clientInstance = new v1.PredictionServiceClient({
        apiEndpoint: `${location}-aiplatform.googleapis.com`,
        projectId,
      });
    }
    return clientInstance;
  }

  async function embed(texts: string[]): Promise<number[][]> {
    try {
      const instances = texts.map((text) => ({
        structValue: {
          fields: {
            content: { stringValue: text },
          },
        },
      }));

      const [response] = await getClient().predict({ endpoint, instances });

      const rawPredictions = response.predictions;
      if (!rawPredictions || rawPredictions.length !== texts.length) {
        log.error({ predictionCount: rawPredictions?.length ?? 0 }, 'Unexpected embedding response');
        throw new EmbeddingUnavailableError(
          `Unexpected embedding response: expected ${String(texts.length)} predictions, got ${String(rawPredictions?.length ?? 0)}`,
        );
      }

      return rawPredictions.map((raw) => {
        const parsed = PredictionSchema.safeParse(
          helpers.fromValue(raw as Parameters<typeof helpers.fromValue>[0]),
        );
        const values = parsed.success ? parsed.data.embeddings.values : undefined;
        if (!values || values.length !== EMBEDDING_DIMENSION) {
          log.error({ valueCount: values?.length ?? 0 }, 'Unexpected embedding structure');
          throw new EmbeddingUnavailableError(
            `Unexpected embedding dimension: expected ${String(EMBEDDING_DIMENSION)}, got ${String(values?.length ?? 0)}`,
          );
        }
        return values;
      });
    } catch (error) {
      if (error instanceof EmbeddingUnavailableError) {
        throw error;
      }
      throw new EmbeddingUnavailableError(
        `Vertex AI embedding failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  return {
    dimension: EMBEDDING_DIMENSION,

    async generateEmbedding(text: string): Promise<number[]> {
      log.debug({ textLength: text.length }, 'Generating single embedding');
      const [result] = await embed([text]);
      return result;
    },

    async generateEmbeddings(texts: string[]): Promise<number[][]> {
      log.debug({ count: texts.length }, 'Generating batch embeddings');
      if (texts.length === 0) {
        return [];
      }
      return embed(texts);
    },
  };
}
