import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: [
        'src/application/expression/**',
        'src/application/aggregator.ts',
        'src/application/window-manager.ts',
        'src/application/rule-engine.ts',
        'src/application/alert-manager.ts',
        'src/application/stream-coordinator.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
