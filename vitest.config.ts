import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Project mode for the workspace packages
    projects: [
      'packages/@trimat/*/vitest.config.ts',
      'packages/shared-test-utils/vitest.config.ts',
      'benchmark/vitest.config.ts',
    ],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      thresholds: {
        lines: 90,
        functions: 90,
        statements: 90,
        branches: 85,
      },
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.config.{ts,js}',
        '**/*.d.ts',
        '**/__tests__/**',
        'benchmark/**',
        'examples/**',
        'packages/shared-test-utils/**',
      ],
    },
  },
})
