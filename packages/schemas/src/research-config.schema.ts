import { z } from 'zod';

export const CapabilitySchema = z.enum(['web', 'academic', 'multimodal']);

const DAY_MS = 24 * 60 * 60 * 1000;

const CacheConfigSchema = z.object({
  metric: z.enum(['cosine', 'dot']).default('cosine'),
  threshold: z.number().min(-1).max(1).default(0.95),
  ttlMs: z.number().int().positive().default(7 * DAY_MS),
  maxCandidates: z.number().int().min(1).max(50).default(5),
});

const ValidationConfigSchema = z.object({
  sameTopicThreshold: z.number().min(0).max(1).default(0.85),
  numericTolerance: z.number().min(0).max(1).default(0.01),
  agentPriority: z
    .array(CapabilitySchema)
    .min(1)
    .refine((list) => new Set(list).size === list.length, {
      message: 'agentPriority must not repeat a capability',
    })
    .default(['academic', 'web', 'multimodal']),
  useEntailmentJudge: z.boolean().default(false),
});

const ReverificationConfigSchema = z.object({
  enabled: z.boolean().default(false),
  maxTasks: z.number().int().min(1).max(10).default(2),
});

const OrchestratorConfigSchema = z.object({
  queryTimeoutMs: z.number().int().positive().default(60_000),
  defaultCapabilities: z.array(CapabilitySchema).min(1).default(['web', 'academic']),
  cacheValidatedResults: z.boolean().default(true),
  reverification: ReverificationConfigSchema.default({}),
});

const ReportConfigSchema = z.object({
  enabled: z.boolean().default(true),
});

const KeywordTableSchema = z.object({
  web: z.array(z.string().min(1)),
  academic: z.array(z.string().min(1)),
  multimodal: z.array(z.string().min(1)),
});

export const DEFAULT_CAPABILITY_KEYWORDS: z.infer<typeof KeywordTableSchema> = {
  web: ['news', 'latest', 'recent', 'current', 'today', 'market', 'price', 'announced', 'trend', 'company'],
  academic: ['paper', 'papers', 'study', 'studies', 'research', 'journal', 'arxiv', 'peer-reviewed', 'survey', 'citation'],
  multimodal: ['video', 'videos', 'image', 'images', 'photo', 'diagram', 'chart', 'podcast', 'lecture', 'slides'],
};

const DecompositionConfigSchema = z.object({
  useLlm: z.boolean().default(true),
  keywords: KeywordTableSchema.default(DEFAULT_CAPABILITY_KEYWORDS),
});

export const ResearchConfigSchema = z.object({
  $schema: z.string().optional(),
  cache: CacheConfigSchema.default({}),
  validation: ValidationConfigSchema.default({}),
  orchestrator: OrchestratorConfigSchema.default({}),
  decomposition: DecompositionConfigSchema.default({}),
  report: ReportConfigSchema.default({}),
});

export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;
export type ResearchConfigInput = z.input<typeof ResearchConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type ValidationConfig = z.infer<typeof ValidationConfigSchema>;
export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
export type DecompositionConfig = z.infer<typeof DecompositionConfigSchema>;
export type ReportConfig = z.infer<typeof ReportConfigSchema>;
