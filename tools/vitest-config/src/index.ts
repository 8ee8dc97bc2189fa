import type { UserConfig } from 'vitest/config';

const SOURCE_GLOBS = [
  'tools/*/src/**/*.ts',
  'packages/*/src/**/*.ts',
  'apps/*/src/**/*.ts',
];

/**
 * Shared Vitest settings for every workspace.
 *
 * Tests live beside their sources as `*.test.ts`; the root config passes the
 * include globs, this base supplies environment, mock hygiene and coverage.
 */
export const defineConfig = (options: UserConfig = {}): UserConfig => {
  const { test, ...rest } = options;

  return {
    ...rest,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: SOURCE_GLOBS,
        exclude: ['**/*.test.ts', '**/index.ts', 'apps/server/src/main.ts'],
      },
      ...test,
    },
  };
};
