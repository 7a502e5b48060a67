import type { ResearchConfig } from '@triangulate/schemas/src/research-config.schema.js';
import { ConfigurationError } from '@triangulate/shared/src/utils/errors.js';
import { createChildLogger } from '@triangulate/shared/src/logger.js';
import type { AgentRegistry } from './agents/research-agent.js';
import { createAgentRegistry } from './agents/research-agent.js';
import { createResearchAgents } from './agents/research-agents.js';
import type { MemoryCache } from './cache/memory-cache.js';
import { createMemoryCache } from './cache/memory-cache.js';
import type { EmbeddingClient } from './embedding/embedding-client.js';
import { createMockEmbeddingClient } from './embedding/mock-embedding-client.js';
import { createVertexEmbeddingClient } from './embedding/vertex-embedding-client.js';
import { createFirestoreCacheBackend } from './infrastructure/firestore-cache-store.repository.js';
import { createFirestoreClient } from './infrastructure/firestore-client.js';
import { createLlmClient } from './llm/llm-client.js';
import type { Orchestrator } from './orchestration/orchestrator.js';
import { createOrchestrator } from './orchestration/orchestrator.js';
import { createDecomposer } from './orchestration/decomposer.js';
import { createReportWriter } from './orchestration/report-writer.js';
import type { CacheBackend } from './repositories/cache-store.repository.js';
import { createInMemoryCacheBackend } from './repositories/in-memory-cache-store.repository.js';
import { createMediaAnalysisClient } from './services/media-analysis/media-analysis-client.js';
import { createMockMediaAnalysisClient } from './services/media-analysis/mock-media-analysis-client.js';
import { createMockWebSearchClient } from './services/web-search/mock-web-search-client.js';
import { createWebSearchClient } from './services/web-search/web-search-client.js';
import { createLlmEntailmentJudge } from './validation/entailment-judge.js';
import { createValidationEngine } from './validation/validation-engine.js';

const log = createChildLogger('runtime');

export type CacheBackendKind = 'firestore' | 'memory';

export interface ResearchRuntimeOptions {
  readonly mock: boolean;
  readonly cacheBackend: CacheBackendKind;
  readonly projectId: string;
  readonly location: string;
}

export interface ResearchRuntime {
  readonly orchestrator: Orchestrator;
  readonly memoryCache: MemoryCache;
  readonly registry: AgentRegistry;
}

export function runtimeOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): ResearchRuntimeOptions {
  const mock = env['TRIANGULATE_MOCK_LLM'] === 'true';
  const backend = env['TRIANGULATE_CACHE_BACKEND'] ?? (mock ? 'memory' : 'firestore');
  if (backend !== 'firestore' && backend !== 'memory') {
    throw new ConfigurationError(
      `TRIANGULATE_CACHE_BACKEND must be "firestore" or "memory", got "${backend}"`,
    );
  }

  return {
    mock,
    cacheBackend: backend,
    projectId: env['TRIANGULATE_GCP_PROJECT_ID'] ?? env['GCP_PROJECT_ID'] ?? '',
    location: env['VERTEX_AI_LOCATION'] ?? 'europe-west1',
  };
}

/** Wires the orchestrator with either Vertex AI collaborators or their local mocks. */
export async function createResearchRuntime(
  config: ResearchConfig,
  options: ResearchRuntimeOptions = runtimeOptionsFromEnv(),
): Promise<ResearchRuntime> {
  log.info(
    { mock: options.mock, cacheBackend: options.cacheBackend },
    'Creating research runtime',
  );

  const llmClient = await createLlmClient();
  const embeddingClient: EmbeddingClient = options.mock
    ? createMockEmbeddingClient()
    : createVertexEmbeddingClient();
  const searchClient = options.mock
    ? createMockWebSearchClient()
    : createWebSearchClient({ projectId: options.projectId, location: options.location });
  const mediaClient = options.mock
    ? createMockMediaAnalysisClient()
    : createMediaAnalysisClient({ projectId: options.projectId, location: options.location });

  const backend: CacheBackend =
    options.cacheBackend === 'memory'
      ? createInMemoryCacheBackend()
      : createFirestoreCacheBackend(createFirestoreClient());

  const memoryCache = createMemoryCache({ embeddingClient, backend }, config.cache);
  const registry = createAgentRegistry(createResearchAgents({ llmClient, searchClient, mediaClient }));

  const orchestrator = createOrchestrator(
    {
      registry,
      memoryCache,
      validationEngine: createValidationEngine(
        { embeddingClient, entailmentJudge: createLlmEntailmentJudge(llmClient) },
        config.validation,
      ),
      decomposer: createDecomposer(
        { llmClient },
        {
          decomposition: config.decomposition,
          defaultCapabilities: config.orchestrator.defaultCapabilities,
        },
      ),
      reportWriter: createReportWriter(llmClient),
    },
    config,
  );

  return { orchestrator, memoryCache, registry };
}
