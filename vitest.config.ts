import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    exclude: ['dist/**', '**/node_modules/**'],
    testTimeout: 20_000,
    // Suites stub POWERMODES_* variables and expect them scoped to the test.
    unstubEnvs: true,
    pool: 'forks',
  },
});
