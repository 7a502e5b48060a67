import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { Orchestrator } from '@triangulate/core/src/orchestration/orchestrator.js';
import type {
  ContradictionSide,
  ValidatedResult,
} from '@triangulate/shared/src/types/research.types.js';
import { createRouter, type AppEnv } from '../types.js';
import { ResearchRequestSchema } from '../schemas/requests.js';
import {
  ErrorResponseSchema,
  NoUsableResultsResponseSchema,
  ResearchResponseSchema,
  type ResearchResponse,
} from '../schemas/responses.js';

const researchRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Research'],
  summary: 'Research a query across agents and return validated claims',
  request: {
    body: {
      content: {
        'application/json': {
          schema: ResearchRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Validated research result',
      content: {
        'application/json': {
          schema: ResearchResponseSchema,
        },
      },
    },
    400: {
      description: 'Validation error',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
    422: {
      description: 'Every subtask failed',
      content: {
        'application/json': {
          schema: NoUsableResultsResponseSchema,
        },
      },
    },
  },
});

type SerializedSide = ResearchResponse['metadata']['superseded'][number];

function serializeSide(side: ContradictionSide): SerializedSide {
  return { ...side, timestamp: side.timestamp.toISOString() };
}

export function toResearchResponse(result: ValidatedResult): ResearchResponse {
  const { metadata } = result;

  return {
    claims: result.claims.map((claim) => ({
      ...claim,
      citations: [...claim.citations],
      sources: claim.sources.map((source) => ({
        ...source,
        timestamp: source.timestamp.toISOString(),
      })),
    })),
    resolvedContradictions: result.resolvedContradictions.map((c) => ({
      ...c,
      winner: serializeSide(c.winner),
      superseded: serializeSide(c.superseded),
    })),
    unresolvedContradictions: result.unresolvedContradictions.map((c) => ({
      ...c,
      claims: c.claims.map(serializeSide),
    })),
    summaries: result.summaries.map((s) => ({ ...s, sourceUrls: [...s.sourceUrls] })),
    warnings: [...result.warnings],
    report: result.report
      ? { ...result.report, citations: [...result.report.citations] }
      : undefined,
    metadata: {
      runId: metadata.runId,
      query: metadata.query,
      decomposition: metadata.decomposition,
      subtasks: metadata.subtasks.map((s) => ({
        ...s,
        mediaUris: s.mediaUris ? [...s.mediaUris] : undefined,
      })),
      failedSubtasks: [...metadata.failedSubtasks],
      cachedSubtasks: [...metadata.cachedSubtasks],
      superseded: metadata.superseded.map(serializeSide),
      degraded: metadata.degraded,
      fromCache: metadata.fromCache,
      startedAt: metadata.startedAt?.toISOString(),
      completedAt: metadata.completedAt?.toISOString(),
    },
  };
}

export function createResearchRoutes(orchestrator: Orchestrator): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(researchRoute, async (c) => {
    const body = c.req.valid('json');
    const result = await orchestrator.handle(body.query, body.hints ?? {});
    return c.json(toResearchResponse(result), 200);
  });

  return routes;
}
