import { defineConfig } from 'vitest/config';

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    testTimeout: 30000,
    hookTimeout: 10000,

    reporters: 'default',
    retry: isCI ? 1 : 0,

    pool: 'forks',
    environment: 'node',
    setupFiles: ['./tests/vitest.setup.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/cli/**'],
    },
  },
});
