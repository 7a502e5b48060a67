import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { CapabilitySchema } from '@triangulate/schemas/src/research-config.schema.js';

export const DecompositionResultSchema = z.object({
  subtasks: z
    .array(
      z.object({
        capability: CapabilitySchema,
        text: z.string().min(1),
      }),
    )
    .min(1)
    .max(6),
  reasoning: z.string().optional(),
});

export type DecompositionResult = z.infer<typeof DecompositionResultSchema>;

export const DecompositionResultJsonSchema = zodToJsonSchema(DecompositionResultSchema, {
  name: 'DecompositionResult',
  $refStrategy: 'none',
});

export const ClaimExtractionResultSchema = z.object({
  summary: z.string(),
  claims: z
    .array(
      z.object({
        statement: z.string().min(1),
        confidence: z.number().min(0).max(1),
        citation: z.string().nullish(),
        topic: z.string().nullish(),
      }),
    )
    .max(10),
});

export type ClaimExtractionResult = z.infer<typeof ClaimExtractionResultSchema>;

export const ClaimExtractionResultJsonSchema = zodToJsonSchema(ClaimExtractionResultSchema, {
  name: 'ClaimExtractionResult',
  $refStrategy: 'none',
});

export const EntailmentResultSchema = z.object({
  verdict: z.enum(['entails', 'contradicts', 'neutral']),
  reasoning: z.string().optional(),
});

export type EntailmentResult = z.infer<typeof EntailmentResultSchema>;

export const EntailmentResultJsonSchema = zodToJsonSchema(EntailmentResultSchema, {
  name: 'EntailmentResult',
  $refStrategy: 'none',
});

export const ResearchReportResultSchema = z.object({
  answer: z.string().min(1),
  contradictions: z.string(),
  limitations: z.string(),
  citations: z.array(z.string()).max(20),
});

export type ResearchReportResult = z.infer<typeof ResearchReportResultSchema>;

export const ResearchReportResultJsonSchema = zodToJsonSchema(ResearchReportResultSchema, {
  name: 'ResearchReportResult',
  $refStrategy: 'none',
});
