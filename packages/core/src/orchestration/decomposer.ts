import type {
  DecompositionConfig,
  OrchestratorConfig,
} from '@triangulate/schemas/src/research-config.schema.js';
import type {
  Capability,
  DecompositionStrategy,
  ResearchQuery,
  Subtask,
} from '@triangulate/shared/src/types/research.types.js';
import { CAPABILITIES } from '@triangulate/shared/src/types/research.types.js';
import { toError } from '@triangulate/shared/src/utils/errors.js';
import { createChildLogger } from '@triangulate/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import {
  DecompositionResultJsonSchema,
  DecompositionResultSchema,
} from '../agents/agent-output.schemas.js';

const log = createChildLogger('orchestration:decomposer');

export interface Decomposition {
  readonly strategy: DecompositionStrategy;
  readonly subtasks: readonly Subtask[];
}

export interface Decomposer {
  decompose(query: ResearchQuery): Promise<Decomposition>;
}

export interface DecomposerDeps {
  readonly llmClient?: LlmClient;
}

export interface DecomposerConfig {
  readonly decomposition: DecompositionConfig;
  readonly defaultCapabilities: OrchestratorConfig['defaultCapabilities'];
}

interface Draft {
  readonly capability: Capability;
  readonly text: string;
}

const SYSTEM_PROMPT = `You are a research coordinator. Split the user's research query into independent subtasks, each handled by exactly one specialist:
- web: current reporting, statistics, company and market information, anything recent
- academic: peer-reviewed papers, studies, surveys, established scientific findings
- multimodal: material that lives in images, video, charts or slides

Rules:
- Together the subtasks must cover the whole query
- Each subtask is a self-contained research instruction
- Use between 1 and 6 subtasks; do not create two subtasks that ask the same thing

Respond with a JSON object containing:
- subtasks: array of { capability, text }
- reasoning: one sentence on why you split the query this way`;

function withDomain(text: string, domain: string | undefined): string {
  return domain ? `${text} [domain: ${domain}]` : text;
}

function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/[^\p{L}\p{N}-]+/u).filter((t) => t.length > 0));
}

export function matchCapabilities(
  text: string,
  keywords: DecompositionConfig['keywords'],
): Capability[] {
  const tokens = tokenize(text);
  const lowered = text.toLowerCase();

  return CAPABILITIES.filter((capability) =>
    keywords[capability].some((keyword) => {
      const needle = keyword.toLowerCase();
      return needle.includes(' ') ? lowered.includes(needle) : tokens.has(needle);
    }),
  );
}

export function createDecomposer(deps: DecomposerDeps, config: DecomposerConfig): Decomposer {
  const { llmClient } = deps;
  const useLlm = config.decomposition.useLlm && llmClient !== undefined;

  async function draftWithLlm(query: ResearchQuery, client: LlmClient): Promise<Draft[]> {
    const domainLine = query.hints.domain ? `\nDomain: ${query.hints.domain}` : '';
    const result = await invokeAndValidate({
      llmClient: client,
      request: {
        systemPrompt: SYSTEM_PROMPT,
        userMessage: `Query: ${query.text}${domainLine}`,
        jsonSchema: DecompositionResultJsonSchema as Record<string, unknown>,
      },
      schema: DecompositionResultSchema,
      agentName: 'Decomposer',
    });

    log.debug({ reasoning: result.reasoning }, 'LLM decomposition reasoning');
    return result.subtasks;
  }

  function draftWithKeywords(query: ResearchQuery): Draft[] {
    const matched = matchCapabilities(query.text, config.decomposition.keywords);
    const capabilities = matched.length > 0 ? matched : config.defaultCapabilities;
    return capabilities.map((capability) => ({ capability, text: query.text }));
  }

  async function draft(query: ResearchQuery): Promise<{ strategy: DecompositionStrategy; drafts: Draft[] }> {
    const hinted = query.hints.capabilities ?? [];
    if (hinted.length > 0) {
      const unique = [...new Set(hinted)];
      return {
        strategy: 'hints',
        drafts: unique.map((capability) => ({ capability, text: query.text })),
      };
    }

    if (useLlm && llmClient) {
      try {
        return { strategy: 'llm', drafts: await draftWithLlm(query, llmClient) };
      } catch (error) {
        log.warn(
          { queryId: query.id, error: toError(error).message },
          'LLM decomposition failed, falling back to keywords',
        );
      }
    }

    return { strategy: 'keywords', drafts: draftWithKeywords(query) };
  }

  return {
    async decompose(query: ResearchQuery): Promise<Decomposition> {
      const { strategy, drafts } = await draft(query);
      const mediaUris = query.hints.mediaUris ?? [];

      if (
        mediaUris.length > 0 &&
        strategy !== 'hints' &&
        !drafts.some((d) => d.capability === 'multimodal')
      ) {
        drafts.push({ capability: 'multimodal', text: query.text });
      }

      const subtasks: Subtask[] = drafts.map((d, index): Subtask => ({
        id: `${query.id}-${String(index + 1)}`,
        queryId: query.id,
        capability: d.capability,
        text: withDomain(d.text, query.hints.domain),
        purpose: 'research',
        ...(d.capability === 'multimodal' && mediaUris.length > 0 ? { mediaUris: [...mediaUris] } : {}),
      }));

      log.info(
        {
          queryId: query.id,
          strategy,
          subtasks: subtasks.map((s) => s.capability),
        },
        'Query decomposed',
      );

      return { strategy, subtasks };
    },
  };
}
