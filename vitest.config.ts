import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: ['packages/**/tests/unit/**/*.test.ts', 'packages/**/tests/properties/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 5000,
  },
  resolve: {
    alias: {
      '@alphaminer/core': resolveFromRoot('packages/core/src/index.ts'),
      '@alphaminer/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@alphaminer/api-clients': resolveFromRoot('packages/api-clients/src/index.ts'),
      '@alphaminer/analytics': resolveFromRoot('packages/analytics/src/index.ts'),
      '@alphaminer/workflows': resolveFromRoot('packages/workflows/src/index.ts'),
    },
  },
});
