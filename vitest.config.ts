import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts', 'src/**/*.test.ts'],
    env: {
      // Keep pino quiet and off the pino-pretty worker thread during tests
      LOG_LEVEL: 'silent',
      LOG_PRETTY: 'false',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.d.ts',
        'src/**/*.test.ts',
        'src/core/types.ts',
        'src/index.ts',
        // The CLI entry point calls main() on import; createProgram() is
        // covered through the command tests instead.
        'src/cli/index.ts',
      ],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
    },
  },
})
