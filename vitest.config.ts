import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      // Keep the developer's own environment out of config resolution
      SITE_HEALTH_SITE_CODE: '',
      SITE_HEALTH_PROVIDER: '',
      SITE_HEALTH_OUTPUT: '',
    },
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    pool: 'threads',
    poolOptions: {
      threads: {
        singleThread: true,
      },
    },
    testTimeout: 30000,
    hookTimeout: 10000,
    teardownTimeout: 5000,
    coverage: {
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/cli/index.ts'],
    },
  },
})
