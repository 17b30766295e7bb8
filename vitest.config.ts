import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@pipevars/engine': fileURLToPath(new URL('./engine/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['engine/src/**/*.test.ts', 'cli/src/**/*.test.ts'],
    setupFiles: ['engine/src/testing/setup.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
