import type { UserConfig } from 'vitest/config';

/** Workspace directories whose `src/` trees hold test files */
const WORKSPACE_ROOTS = ['tools', 'packages', 'apps'];

export const defineConfig = (options: UserConfig = {}): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: WORKSPACE_ROOTS.map((root) => `${root}/*/src/**/*.test.ts`),
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: WORKSPACE_ROOTS.map((root) => `${root}/*/src/**/*.ts`),
        exclude: ['**/index.ts', '**/*.test.ts', 'apps/*/src/bin/**'],
      },
      ...options.test,
    },
  };
};
