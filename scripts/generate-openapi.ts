import { createApp, OPENAPI_INFO } from '../packages/api/src/app.js';
import { ConfigurationError } from '../packages/shared/src/utils/errors.js';

// Only the route definitions matter here; no request is ever served
const app = createApp({
  orchestrator: {
    handle: () => Promise.reject(new ConfigurationError('Not available while generating docs')),
  },
});

const doc = app.getOpenAPI31Document({
  openapi: '3.1.0',
  info: OPENAPI_INFO,
  servers: [{ url: 'http://localhost:3000', description: 'Local development' }],
});

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');
