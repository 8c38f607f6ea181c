import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/pipeline.ts', 'src/diagnostics/types.ts'],
      thresholds: {
        // Start moderate; raise over time as coverage improves.
        statements: 80,
        branches: 70,
        functions: 80,
        lines: 80,
      },
    },
  },
});
