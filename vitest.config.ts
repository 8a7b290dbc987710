import path from 'node:path';
import { defineConfig } from 'vitest/config';

const workspacePackages = ['shared', 'repo', 'adapters', 'core', 'cli'];

export default defineConfig({
  resolve: {
    alias: Object.fromEntries(
      workspacePackages.map((name) => [
        `@promptctx/${name}`,
        path.resolve(__dirname, 'packages', name, 'src', 'index.ts'),
      ]),
    ),
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
