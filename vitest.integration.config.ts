import { defineConfig } from 'vitest/config';
import { workspaceAliases } from './vitest.config.js';

export default defineConfig({
  resolve: {
    alias: workspaceAliases,
  },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.integration.test.ts'],
    testTimeout: 30000,
  },
});
