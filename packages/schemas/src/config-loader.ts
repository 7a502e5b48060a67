import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError } from '@triangulate/shared/src/utils/errors.js';
import { validateResearchConfig } from './validators.js';
import type { ResearchConfig } from './research-config.schema.js';

export const CONFIG_FILE_NAME = 'research.json';

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

export async function loadConfig(configDir: string): Promise<ResearchConfig> {
  const raw = await readJsonFile(join(configDir, CONFIG_FILE_NAME));
  return validateResearchConfig(raw);
}
