import type {
  AgentResult,
  Capability,
  Subtask,
} from '@triangulate/shared/src/types/research.types.js';
import type { SubtaskFailure } from '@triangulate/shared/src/utils/errors.js';
import {
  AgentTimeoutError,
  TriangulateError,
  UnsupportedCapabilityError,
  toError,
} from '@triangulate/shared/src/utils/errors.js';
import { createChildLogger } from '@triangulate/shared/src/logger.js';
import type { AgentRegistry } from '../agents/research-agent.js';
import type { MemoryCache } from '../cache/memory-cache.js';

const log = createChildLogger('orchestration:dispatcher');

export type SubtaskOutcome =
  | { readonly status: 'fresh'; readonly subtask: Subtask; readonly result: AgentResult }
  | {
      readonly status: 'cached';
      readonly subtask: Subtask;
      readonly result: AgentResult;
      readonly similarity: number;
    }
  | { readonly status: 'failed'; readonly subtask: Subtask; readonly failure: SubtaskFailure };

export interface SubtaskDispatcherDeps {
  readonly registry: AgentRegistry;
  readonly memoryCache: MemoryCache;
}

export interface SubtaskDispatcher {
  /** Runs every subtask concurrently; outcomes come back in subtask order. */
  dispatch(subtasks: readonly Subtask[], signal: AbortSignal): Promise<SubtaskOutcome[]>;
}

export function agentScope(capability: Capability): string {
  return `agent:${capability}`;
}

export function isSuccess(
  outcome: SubtaskOutcome,
): outcome is Extract<SubtaskOutcome, { status: 'fresh' | 'cached' }> {
  return outcome.status !== 'failed';
}

function toFailure(subtask: Subtask, error: unknown): SubtaskFailure {
  const err = toError(error);
  return {
    subtaskId: subtask.id,
    capability: subtask.capability,
    code: err instanceof TriangulateError ? err.code : 'AGENT_UNAVAILABLE',
    message: err.message,
  };
}

function rejectOnAbort(signal: AbortSignal, onAbort: () => Error): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(onAbort());
      return;
    }
    signal.addEventListener('abort', () => reject(onAbort()), { once: true });
  });
}

export function createSubtaskDispatcher(deps: SubtaskDispatcherDeps): SubtaskDispatcher {
  const { registry, memoryCache } = deps;

  async function fromCache(subtask: Subtask): Promise<SubtaskOutcome | null> {
    // Verification asks for a fresh look, so it never reads the cache
    if (subtask.purpose !== 'research') {
      return null;
    }
    const hit = await memoryCache.lookup(subtask.text, agentScope(subtask.capability));
    if (!hit || hit.entry.payload.kind !== 'agent-result') {
      return null;
    }
    return {
      status: 'cached',
      subtask,
      result: { ...hit.entry.payload.value, subtaskId: subtask.id },
      similarity: hit.similarity,
    };
  }

  async function runOne(subtask: Subtask, signal: AbortSignal): Promise<SubtaskOutcome> {
    const cached = await fromCache(subtask);
    if (cached) {
      log.debug({ subtaskId: subtask.id, capability: subtask.capability }, 'Subtask served from cache');
      return cached;
    }

    const agent = registry.get(subtask.capability);
    if (!agent) {
      const failure = toFailure(subtask, new UnsupportedCapabilityError(subtask.capability));
      log.warn({ ...failure }, 'No agent for subtask capability');
      return { status: 'failed', subtask, failure };
    }

    try {
      const result = await Promise.race([
        agent.research(subtask, signal),
        rejectOnAbort(
          signal,
          () =>
            new AgentTimeoutError(agent.id, `Agent ${agent.id} timed out on subtask ${subtask.id}`),
        ),
      ]);
      return { status: 'fresh', subtask, result: { ...result, subtaskId: subtask.id } };
    } catch (error) {
      const failure = toFailure(subtask, error);
      log.warn({ ...failure, agentId: agent.id }, 'Subtask failed');
      return { status: 'failed', subtask, failure };
    }
  }

  return {
    async dispatch(subtasks: readonly Subtask[], signal: AbortSignal): Promise<SubtaskOutcome[]> {
      log.info({ subtasks: subtasks.length }, 'Dispatching subtasks');
      return Promise.all(subtasks.map((subtask) => runOne(subtask, signal)));
    },
  };
}
