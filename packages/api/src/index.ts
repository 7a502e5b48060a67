import { resolve } from 'node:path';
import { serve } from '@hono/node-server';
import { loadConfig } from '@triangulate/schemas/src/config-loader.js';
import { createResearchRuntime } from '@triangulate/core/src/research-runtime.js';
import { createChildLogger } from '@triangulate/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);
  const configDir = process.env['TRIANGULATE_CONFIG_DIR'] ?? resolve(process.cwd(), 'config');

  const config = await loadConfig(configDir);
  const { orchestrator } = await createResearchRuntime(config);

  const app = createApp({ orchestrator });

  log.info({ port, configDir }, 'Starting Triangulate API server');

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Triangulate API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
