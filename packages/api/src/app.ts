import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import { requestId } from 'hono/request-id';
import type { Orchestrator } from '@triangulate/core/src/orchestration/orchestrator.js';
import { createRouter, type AppEnv } from './types.js';
import { errorHandler } from './middleware/error-handler.js';
import { health } from './routes/health.js';
import { createResearchRoutes } from './routes/research.js';
import { createChildLogger } from '@triangulate/shared/src/logger.js';

const log = createChildLogger('api:server');

export const OPENAPI_INFO = {
  title: 'Triangulate API',
  version: '0.1.0',
  description: 'Multi-agent research with semantic caching and cross-agent claim validation',
};

export interface AppConfig {
  readonly orchestrator: Orchestrator;
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId());

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', health);

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: OPENAPI_INFO,
    });
    return c.json(spec);
  });

  app.route('/research', createResearchRoutes(config.orchestrator));

  return app;
}
