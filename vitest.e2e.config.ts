import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['services/common/*/test/**/*.e2e.test.ts'],
    exclude: ['node_modules'],
    // E2E tests launch a real Chrome
    testTimeout: 120000,
    fileParallelism: false,
  },
});
