import type { ZodError } from 'zod';
import { SchemaValidationError } from '@triangulate/shared/src/utils/errors.js';
import { ResearchConfigSchema } from './research-config.schema.js';
import type { ResearchConfig } from './research-config.schema.js';

function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateResearchConfig(data: unknown): ResearchConfig {
  const result = ResearchConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid research configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function defaultResearchConfig(): ResearchConfig {
  return validateResearchConfig({});
}
