import { z } from 'zod';
import { CapabilitySchema } from '@triangulate/schemas/src/research-config.schema.js';
import type { CacheEntry } from '@triangulate/shared/src/types/cache.types.js';

const ClaimSchema = z.object({
  statement: z.string(),
  confidence: z.number().min(0).max(1),
  citation: z.string().optional(),
  topic: z.string().optional(),
});

const AgentResultSchema = z.object({
  agentId: z.string(),
  capability: CapabilitySchema,
  subtaskId: z.string(),
  claims: z.array(ClaimSchema),
  summary: z.string(),
  sourceUrls: z.array(z.string()),
  timestamp: z.coerce.date(),
});

const ValueKindSchema = z.enum(['numeric', 'date', 'boolean', 'text']);

const ProvenanceSchema = z.object({
  agentId: z.string(),
  capability: CapabilitySchema,
  subtaskId: z.string(),
  confidence: z.number(),
  timestamp: z.coerce.date(),
  citation: z.string().optional(),
});

const ContradictionSideSchema = z.object({
  statement: z.string(),
  confidence: z.number(),
  agentId: z.string(),
  capability: CapabilitySchema,
  timestamp: z.coerce.date(),
});

const SubtaskSchema = z.object({
  id: z.string(),
  queryId: z.string(),
  capability: CapabilitySchema,
  text: z.string(),
  purpose: z.enum(['research', 'verification']),
  mediaUris: z.array(z.string()).optional(),
});

const ValidatedResultSchema = z.object({
  claims: z.array(
    z.object({
      statement: z.string(),
      confidence: z.number(),
      valueKind: ValueKindSchema,
      citations: z.array(z.string()),
      sources: z.array(ProvenanceSchema),
      contested: z.boolean(),
    }),
  ),
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
      claims: z.tuple([ContradictionSideSchema, ContradictionSideSchema]),
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
  report: z
    .object({
      answer: z.string(),
      contradictions: z.string(),
      limitations: z.string(),
      citations: z.array(z.string()),
    })
    .optional(),
  metadata: z.object({
    runId: z.string().optional(),
    query: z.string().optional(),
    decomposition: z.enum(['hints', 'llm', 'keywords']).optional(),
    subtasks: z.array(SubtaskSchema),
    failedSubtasks: z.array(
      z.object({
        subtaskId: z.string(),
        capability: z.string(),
        code: z.string(),
        message: z.string(),
      }),
    ),
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
    startedAt: z.coerce.date().optional(),
    completedAt: z.coerce.date().optional(),
  }),
});

const CachePayloadSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('agent-result'), value: AgentResultSchema }),
  z.object({ kind: z.literal('validated-result'), value: ValidatedResultSchema }),
]);

export const CacheEntrySchema = z.object({
  id: z.string().min(1),
  scope: z.string().min(1),
  queryText: z.string(),
  queryEmbedding: z.array(z.number()),
  payload: CachePayloadSchema,
  createdAt: z.coerce.date(),
  ttlMs: z.number().int().positive(),
});

export function serializeCacheEntry(entry: CacheEntry): string {
  return JSON.stringify(entry);
}

/** Returns null for anything that is not a well-formed entry. */
export function parseCacheEntry(raw: string): CacheEntry | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const result = CacheEntrySchema.safeParse(json);
  return result.success ? result.data : null;
}
