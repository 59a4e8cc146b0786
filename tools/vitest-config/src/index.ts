import type { UserConfig } from 'vitest/config';

export const defineConfig = (options: UserConfig = {}): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['src/**/*.ts'],
        exclude: ['src/index.ts', '**/index.ts', 'src/**/*.test.ts'],
      },
      ...options.test,
    },
  };
};
