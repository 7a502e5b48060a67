import type { AgentResult, Capability, Subtask } from '@triangulate/shared/src/types/research.types.js';
import {
  AgentTimeoutError,
  AgentUnavailableError,
  toError,
} from '@triangulate/shared/src/utils/errors.js';
import { createChildLogger } from '@triangulate/shared/src/logger.js';
import type { LlmClient } from '../llm/llm-client.js';
import { extractFindings } from './claim-extractor.js';
import type { ResearchAgent } from './research-agent.js';
import type { ResearchSource } from './research-sources.js';

const log = createChildLogger('agent:research');

export interface LlmResearchAgentConfig {
  readonly id: string;
  readonly capability: Capability;
  readonly source: ResearchSource;
  readonly llmClient: LlmClient;
}

export function createLlmResearchAgent(config: LlmResearchAgentConfig): ResearchAgent {
  const { id, capability, source, llmClient } = config;

  function timeout(subtask: Subtask): AgentTimeoutError {
    return new AgentTimeoutError(id, `Agent ${id} timed out on subtask ${subtask.id}`);
  }

  return {
    id,
    capability,

    async research(subtask: Subtask, signal: AbortSignal): Promise<AgentResult> {
      if (signal.aborted) {
        throw timeout(subtask);
      }

      log.info({ agentId: id, subtaskId: subtask.id, purpose: subtask.purpose }, 'Researching subtask');

      try {
        const material = await source.gather(subtask, signal);
        if (signal.aborted) {
          throw timeout(subtask);
        }

        const findings = await extractFindings(subtask, material, llmClient);
        if (signal.aborted) {
          throw timeout(subtask);
        }

        return {
          agentId: id,
          capability,
          subtaskId: subtask.id,
          claims: findings.claims,
          summary: findings.summary,
          sourceUrls: [...material.sourceUrls],
          timestamp: new Date(),
        };
      } catch (error) {
        if (error instanceof AgentTimeoutError) {
          throw error;
        }
        if (signal.aborted) {
          throw timeout(subtask);
        }

        const cause = toError(error);
        log.warn({ agentId: id, subtaskId: subtask.id, error: cause.message }, 'Agent failed');
        throw new AgentUnavailableError(id, `Agent ${id} failed: ${cause.message}`, cause);
      }
    },
  };
}
