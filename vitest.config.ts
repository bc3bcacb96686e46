import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // Keep the suite's stderr readable; tests that care set LOG_LEVEL themselves
    env: { LOG_LEVEL: 'error' },
    coverage: {
      provider: 'istanbul',
      include: ['src/**/*.ts'],
      exclude: ['src/server/index.ts', 'src/domain/matching/types.ts'],
      reporter: ['text', 'text-summary'],
      thresholds: {
        statements: 80,
        branches: 70,
        functions: 80,
        lines: 80,
      },
    },
  },
});
