export const sharedVitestConfig = {
  test: {
    globals: true,
    silent: true,
    coverage: {
      provider: 'v8' as const,
      reporter: ['text', 'html'],
      all: true,
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        'packages/vitest-config/**',
        // Type-only contracts have no runtime to execute.
        'packages/core/src/types/**/*.ts',
        'packages/core/src/stores/cache-store.ts',
      ],
      thresholds: {
        lines: 100,
        functions: 100,
        branches: 100,
        statements: 100,
      },
      perFile: true,
    },
  },
};
