import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const REPO_ROOT = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@flagwise/core': path.join(REPO_ROOT, 'packages/@flagwise/core/src/index.ts'),
      '@flagwise/cli': path.join(REPO_ROOT, 'packages/@flagwise/cli/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
