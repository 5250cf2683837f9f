import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'apps/server/src/**/*.test.ts',
      'apps/server/tests/integration/**/*.test.ts',
      'apps/cli/src/**/*.test.ts',
    ],
    setupFiles: ['apps/server/tests/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['apps/server/src/services/**', 'apps/server/src/repositories/**'],
      exclude: ['**/*.d.ts', '**/index.ts'],
    },
  },
  resolve: {
    alias: {
      '@server': fileURLToPath(new URL('./apps/server/src', import.meta.url)),
      '@tests': fileURLToPath(new URL('./apps/server/tests', import.meta.url)),
    },
  },
});
