import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function workspace(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}`, import.meta.url));
}

export const workspaceAliases = {
  '@triangulate/shared': workspace('shared'),
  '@triangulate/schemas': workspace('schemas'),
  '@triangulate/core': workspace('core'),
  '@triangulate/api': workspace('api'),
};

export default defineConfig({
  resolve: {
    alias: workspaceAliases,
  },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['packages/*/src/**/*.integration.test.ts', 'node_modules'],
  },
});
