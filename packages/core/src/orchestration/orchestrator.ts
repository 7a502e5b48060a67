import { randomUUID } from 'node:crypto';
import { StateGraph, START, END } from '@langchain/langgraph';
import type { ResearchConfig } from '@triangulate/schemas/src/research-config.schema.js';
import type {
  Capability,
  QueryHints,
  ResearchQuery,
  Subtask,
  UnresolvedContradiction,
  ValidatedResult,
} from '@triangulate/shared/src/types/research.types.js';
import type { SubtaskFailure } from '@triangulate/shared/src/utils/errors.js';
import {
  AgentTimeoutError,
  NoUsableResultsError,
  SchemaValidationError,
  toError,
} from '@triangulate/shared/src/utils/errors.js';
import { createChildLogger } from '@triangulate/shared/src/logger.js';
import type { AgentRegistry } from '../agents/research-agent.js';
import type { MemoryCache } from '../cache/memory-cache.js';
import type { ValidationEngine } from '../validation/validation-engine.js';
import type { Decomposer } from './decomposer.js';
import type { ReportWriter } from './report-writer.js';
import { ResearchGraphAnnotation, type ResearchGraphState } from './research-graph-state.js';
import type { SubtaskOutcome } from './subtask-dispatcher.js';
import { agentScope, createSubtaskDispatcher, isSuccess } from './subtask-dispatcher.js';

const log = createChildLogger('orchestration:orchestrator');

export const VALIDATED_SCOPE = 'validated';

export const REPORT_FAILED_WARNING =
  'Report synthesis failed; returning validated claims without a report';

export interface OrchestratorDeps {
  readonly registry: AgentRegistry;
  readonly memoryCache: MemoryCache;
  readonly validationEngine: ValidationEngine;
  readonly decomposer: Decomposer;
  readonly reportWriter?: ReportWriter;
}

export interface Orchestrator {
  handle(queryText: string, hints?: QueryHints): Promise<ValidatedResult>;
}

/** Text under which a whole query is cached; hints change the answer, so they are part of it. */
export function queryCacheText(query: Pick<ResearchQuery, 'text' | 'hints'>): string {
  const parts: string[] = [];
  if (query.hints.domain) {
    parts.push(`domain=${query.hints.domain}`);
  }
  if (query.hints.capabilities && query.hints.capabilities.length > 0) {
    parts.push(`capabilities=${[...new Set(query.hints.capabilities)].sort().join(',')}`);
  }
  if (query.hints.mediaUris && query.hints.mediaUris.length > 0) {
    parts.push(`media=${[...query.hints.mediaUris].sort().join(',')}`);
  }
  return parts.length > 0 ? `${query.text}\n[${parts.join('; ')}]` : query.text;
}

function failuresOf(outcomes: readonly SubtaskOutcome[]): SubtaskFailure[] {
  return outcomes.flatMap((o) => (o.status === 'failed' ? [o.failure] : []));
}

function routeAfterLookup(state: ResearchGraphState): string {
  return state.cachedResult ? '__end__' : 'decompose';
}

function routeAfterDispatch(state: ResearchGraphState): string {
  return state.outcomes.some(isSuccess) ? 'reconcile' : '__end__';
}

export function createOrchestrator(deps: OrchestratorDeps, config: ResearchConfig): Orchestrator {
  const { registry, memoryCache, validationEngine, decomposer, reportWriter } = deps;
  const { orchestrator: orchestratorConfig } = config;
  const dispatcher = createSubtaskDispatcher({ registry, memoryCache });

  function verificationCapability(): Capability | undefined {
    const registered = registry.capabilities();
    return (
      config.validation.agentPriority.find((c) => registered.includes(c)) ?? registered[0]
    );
  }

  function verificationSubtasks(
    query: ResearchQuery,
    contradictions: readonly UnresolvedContradiction[],
  ): Subtask[] {
    const capability = verificationCapability();
    if (!capability) {
      return [];
    }
    return contradictions
      .slice(0, orchestratorConfig.reverification.maxTasks)
      .map(
        (c, i): Subtask => ({
          id: `${query.id}-verify-${String(i + 1)}`,
          queryId: query.id,
          capability,
          text: `Verify which statement about "${c.topic}" is correct: "${c.claims[0].statement}" or "${c.claims[1].statement}"`,
          purpose: 'verification',
        }),
      );
  }

  async function reconcileOutcomes(outcomes: readonly SubtaskOutcome[]): Promise<ValidatedResult> {
    return validationEngine.reconcile(outcomes.filter(isSuccess).map((o) => o.result));
  }

  async function lookupQueryNode(state: ResearchGraphState): Promise<Partial<ResearchGraphState>> {
    if (!orchestratorConfig.cacheValidatedResults) {
      return {};
    }
    const hit = await memoryCache.lookup(queryCacheText(state.query), VALIDATED_SCOPE);
    if (!hit || hit.entry.payload.kind !== 'validated-result') {
      return {};
    }
    log.info(
      { runId: state.runId, similarity: hit.similarity, entryId: hit.entry.id },
      'Serving validated result from cache',
    );
    const cached = hit.entry.payload.value;
    return { cachedResult: { ...cached, metadata: { ...cached.metadata, fromCache: true } } };
  }

  async function decomposeNode(state: ResearchGraphState): Promise<Partial<ResearchGraphState>> {
    const { strategy, subtasks } = await decomposer.decompose(state.query);
    return { decomposition: strategy, subtasks };
  }

  async function dispatchNode(state: ResearchGraphState): Promise<Partial<ResearchGraphState>> {
    const outcomes = await dispatcher.dispatch(state.subtasks, state.signal);
    return { outcomes };
  }

  async function reconcileNode(state: ResearchGraphState): Promise<Partial<ResearchGraphState>> {
    return { validated: await reconcileOutcomes(state.outcomes) };
  }

  function routeAfterReconcile(state: ResearchGraphState): string {
    const unresolved = state.validated?.unresolvedContradictions.length ?? 0;
    return orchestratorConfig.reverification.enabled && unresolved > 0 && !state.signal.aborted
      ? 'reverify'
      : 'report';
  }

  async function reverifyNode(state: ResearchGraphState): Promise<Partial<ResearchGraphState>> {
    const contradictions = state.validated?.unresolvedContradictions ?? [];
    const extra = verificationSubtasks(state.query, contradictions);
    if (extra.length === 0) {
      return {};
    }

    log.info(
      { runId: state.runId, contradictions: contradictions.length, verifying: extra.length },
      'Re-verifying unresolved contradictions',
    );

    const verification = await dispatcher.dispatch(extra, state.signal);
    const outcomes = [...state.outcomes, ...verification];
    return {
      subtasks: [...state.subtasks, ...extra],
      outcomes,
      validated: await reconcileOutcomes(outcomes),
    };
  }

  async function reportNode(state: ResearchGraphState): Promise<Partial<ResearchGraphState>> {
    if (!state.validated || !reportWriter || !config.report.enabled || state.signal.aborted) {
      return {};
    }

    try {
      const report = await reportWriter.write(state.query.text, state.validated);
      return { validated: { ...state.validated, report } };
    } catch (error) {
      log.warn({ runId: state.runId, error: toError(error).message }, 'Report synthesis failed');
      return {
        validated: {
          ...state.validated,
          warnings: [...state.validated.warnings, REPORT_FAILED_WARNING],
        },
      };
    }
  }

  async function assembleNode(state: ResearchGraphState): Promise<Partial<ResearchGraphState>> {
    if (!state.validated) {
      return {};
    }

    const failedSubtasks = failuresOf(state.outcomes);
    const cachedSubtasks = state.outcomes.flatMap((o) =>
      o.status === 'cached'
        ? [{ subtaskId: o.subtask.id, capability: o.subtask.capability, similarity: o.similarity }]
        : [],
    );

    const validated: ValidatedResult = {
      ...state.validated,
      metadata: {
        ...state.validated.metadata,
        runId: state.runId,
        query: state.query.text,
        decomposition: state.decomposition,
        subtasks: state.subtasks,
        failedSubtasks,
        cachedSubtasks,
        fromCache: false,
        startedAt: state.startedAt,
        completedAt: new Date(),
      },
    };

    for (const outcome of state.outcomes) {
      if (outcome.status === 'fresh' && outcome.subtask.purpose === 'research') {
        await memoryCache.store(
          outcome.subtask.text,
          { kind: 'agent-result', value: outcome.result },
          agentScope(outcome.subtask.capability),
        );
      }
    }

    // Only complete, non-degraded answers are replayed
    if (
      orchestratorConfig.cacheValidatedResults &&
      failedSubtasks.length === 0 &&
      !validated.metadata.degraded.validation &&
      !validated.warnings.includes(REPORT_FAILED_WARNING)
    ) {
      await memoryCache.store(
        queryCacheText(state.query),
        { kind: 'validated-result', value: validated },
        VALIDATED_SCOPE,
      );
    }

    return { validated };
  }

  const graph = new StateGraph(ResearchGraphAnnotation)
    .addNode('lookupQuery', lookupQueryNode)
    .addNode('decompose', decomposeNode)
    .addNode('dispatch', dispatchNode)
    .addNode('reconcile', reconcileNode)
    .addNode('reverify', reverifyNode)
    .addNode('report', reportNode)
    .addNode('assemble', assembleNode)
    .addEdge(START, 'lookupQuery')
    .addConditionalEdges('lookupQuery', routeAfterLookup, {
      decompose: 'decompose',
      __end__: END,
    })
    .addEdge('decompose', 'dispatch')
    .addConditionalEdges('dispatch', routeAfterDispatch, {
      reconcile: 'reconcile',
      __end__: END,
    })
    .addConditionalEdges('reconcile', routeAfterReconcile, {
      reverify: 'reverify',
      report: 'report',
    })
    .addEdge('reverify', 'report')
    .addEdge('report', 'assemble')
    .addEdge('assemble', END)
    .compile();

  return {
    async handle(queryText: string, hints: QueryHints = {}): Promise<ValidatedResult> {
      const text = queryText.trim();
      if (text.length === 0) {
        throw new SchemaValidationError('Query text must not be empty', ['query: empty']);
      }

      const query: ResearchQuery = { id: randomUUID(), text, hints, submittedAt: new Date() };
      const runId = randomUUID();
      const controller = new AbortController();
      const timer = setTimeout(() => {
        controller.abort(
          new AgentTimeoutError(
            'orchestrator',
            `Query ${query.id} exceeded ${String(orchestratorConfig.queryTimeoutMs)}ms`,
          ),
        );
      }, orchestratorConfig.queryTimeoutMs);

      log.info({ runId, queryId: query.id, hints }, 'Handling research query');

      try {
        const final = await graph.invoke({
          runId,
          query,
          signal: controller.signal,
          startedAt: new Date(),
          cachedResult: undefined,
          decomposition: undefined,
          subtasks: [],
          outcomes: [],
          validated: undefined,
        });

        if (final.cachedResult) {
          return final.cachedResult;
        }
        if (!final.validated) {
          const failures = failuresOf(final.outcomes);
          log.error({ runId, failures }, 'Every subtask failed');
          throw new NoUsableResultsError(failures);
        }

        log.info(
          {
            runId,
            claims: final.validated.claims.length,
            failed: final.validated.metadata.failedSubtasks.length,
            cached: final.validated.metadata.cachedSubtasks.length,
          },
          'Research query complete',
        );
        return final.validated;
      } finally {
        clearTimeout(timer);
      }
    },
  };
}
