import { configDefaults, coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    exclude: [...configDefaults.exclude, '**/.direnv/**', 'dist/**'],
    coverage: {
      exclude: [...coverageConfigDefaults.exclude, '**/.direnv/**'],
    },
    sequence: {
      hooks: 'stack',
    },
    reporters: ['default'],
    pool: 'forks',
    testTimeout: 5_000,
  },
});
