import type { AgentResult, Capability, Subtask } from '@triangulate/shared/src/types/research.types.js';
import { ConfigurationError } from '@triangulate/shared/src/utils/errors.js';

/**
 * A specialist that answers one subtask. Implementations reject with
 * AgentUnavailableError or AgentTimeoutError and stop work once `signal` aborts.
 */
export interface ResearchAgent {
  readonly id: string;
  readonly capability: Capability;
  research(subtask: Subtask, signal: AbortSignal): Promise<AgentResult>;
}

export interface AgentRegistry {
  get(capability: Capability): ResearchAgent | undefined;
  capabilities(): readonly Capability[];
}

export function createAgentRegistry(agents: readonly ResearchAgent[]): AgentRegistry {
  const byCapability = new Map<Capability, ResearchAgent>();

  for (const agent of agents) {
    const existing = byCapability.get(agent.capability);
    if (existing) {
      throw new ConfigurationError(
        `Agents "${existing.id}" and "${agent.id}" both claim capability "${agent.capability}"`,
      );
    }
    byCapability.set(agent.capability, agent);
  }

  return {
    get(capability: Capability): ResearchAgent | undefined {
      return byCapability.get(capability);
    },

    capabilities(): readonly Capability[] {
      return [...byCapability.keys()];
    },
  };
}
