import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'geo-accuracy',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    testTimeout: 30000,
    pool: 'forks',
    globals: true,
    setupFiles: ['./src/__tests__/setup.ts'],
    // Module-level loggers read LOG_LEVEL when first imported
    env: { LOG_LEVEL: 'silent' },
  },
});
