import { z } from '@hono/zod-openapi';
import { CapabilitySchema } from '@triangulate/schemas/src/research-config.schema.js';

export const QueryHintsSchema = z
  .object({
    domain: z.string().trim().min(1).max(200).optional(),
    capabilities: z.array(CapabilitySchema).min(1).optional(),
    mediaUris: z.array(z.string().url()).max(10).optional(),
  })
  .openapi('QueryHints');

export const ResearchRequestSchema = z
  .object({
    query: z.string().trim().min(1).max(2000).openapi({ example: 'What is the current inflation rate in Germany?' }),
    hints: QueryHintsSchema.optional(),
  })
  .openapi('ResearchRequest');

export type ResearchRequest = z.infer<typeof ResearchRequestSchema>;
