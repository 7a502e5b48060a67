import { z } from '@hono/zod-openapi';
import { CapabilitySchema } from '@triangulate/schemas/src/research-config.schema.js';

const SubtaskFailureSchema = z
  .object({
    subtaskId: z.string(),
    capability: z.string(),
    code: z.string(),
    message: z.string(),
  })
  .openapi('SubtaskFailure');

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

export const NoUsableResultsResponseSchema = ErrorResponseSchema.extend({
  failures: z.array(SubtaskFailureSchema),
}).openapi('NoUsableResultsResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

// Research
const ValueKindSchema = z.enum(['numeric', 'date', 'boolean', 'text']);

const ContradictionSideSchema = z
  .object({
    statement: z.string(),
    confidence: z.number(),
    agentId: z.string(),
    capability: CapabilitySchema,
    timestamp: z.string(),
  })
  .openapi('ContradictionSide');

const ValidatedClaimSchema = z
  .object({
    statement: z.string(),
    confidence: z.number(),
    valueKind: ValueKindSchema,
    citations: z.array(z.string()),
    sources: z.array(
      z.object({
        agentId: z.string(),
        capability: CapabilitySchema,
        subtaskId: z.string(),
        confidence: z.number(),
        timestamp: z.string(),
        citation: z.string().optional(),
      }),
    ),
    contested: z.boolean(),
  })
  .openapi('ValidatedClaim');

const ResearchReportSchema = z
  .object({
    answer: z.string(),
    contradictions: z.string(),
    limitations: z.string(),
    citations: z.array(z.string()),
  })
  .openapi('ResearchReport');

export const ResearchResponseSchema = z
  .object({
    claims: z.array(ValidatedClaimSchema),
    resolvedContradictions: z.array(
      z.object({
        topic: z.string(),
        valueKind: ValueKindSchema,
        winner: ContradictionSideSchema,
        superseded: ContradictionSideSchema,
        rule: z.enum(['confidence', 'recency', 'agent_priority']),
        rationale: z.string(),
      }),
    ),
    unresolvedContradictions: z.array(
      z.object({
        topic: z.string(),
        valueKind: ValueKindSchema,
        claims: z.array(ContradictionSideSchema),
        warning: z.string(),
      }),
    ),
    summaries: z.array(
      z.object({
        agentId: z.string(),
        capability: CapabilitySchema,
        subtaskId: z.string(),
        summary: z.string(),
        sourceUrls: z.array(z.string()),
      }),
    ),
    warnings: z.array(z.string()),
    report: ResearchReportSchema.optional(),
    metadata: z.object({
      runId: z.string().optional(),
      query: z.string().optional(),
      decomposition: z.enum(['hints', 'llm', 'keywords']).optional(),
      subtasks: z.array(
        z.object({
          id: z.string(),
          queryId: z.string(),
          capability: CapabilitySchema,
          text: z.string(),
          purpose: z.enum(['research', 'verification']),
          mediaUris: z.array(z.string()).optional(),
        }),
      ),
      failedSubtasks: z.array(SubtaskFailureSchema),
      cachedSubtasks: z.array(
        z.object({
          subtaskId: z.string(),
          capability: CapabilitySchema,
          similarity: z.number(),
        }),
      ),
      superseded: z.array(ContradictionSideSchema),
      degraded: z.object({ validation: z.boolean() }),
      fromCache: z.boolean(),
      startedAt: z.string().optional(),
      completedAt: z.string().optional(),
    }),
  })
  .openapi('ResearchResponse');

export type ResearchResponse = z.infer<typeof ResearchResponseSchema>;
