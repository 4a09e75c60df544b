import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: ['packages/**/tests/unit/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 5000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      reportsDirectory: 'coverage',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/**/src/**/index.ts', 'packages/**/src/bin/**'],
    },
  },
  resolve: {
    // Workspace packages export dist/ at runtime; tests run against sources
    alias: {
      '@windmill/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@windmill/client': resolveFromRoot('packages/client/src/index.ts'),
      '@windmill/cli': resolveFromRoot('packages/cli/src/index.ts'),
    },
  },
});
