import { defineConfig } from 'vitest/config';

// Workspace packages resolve to their TypeScript sources under the
// "development" export condition; Node loads the compiled dist/ files.
export default defineConfig({
  resolve: {
    conditions: ['development'],
  },
  ssr: {
    resolve: {
      conditions: ['development'],
    },
  },
  test: {
    include: ['engine/tests/**/*.test.ts', 'cli/tests/**/*.test.ts'],
    environment: 'node',
  },
});
