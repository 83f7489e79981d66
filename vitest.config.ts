import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@conductor/engine': fileURLToPath(new URL('./engine/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['engine/src/**/*.test.ts', 'cli/src/**/*.test.ts'],
    environment: 'node',
  },
});
