import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/*/src/**/*.test.ts',
      'services/common/*/test/**/*.ut.test.ts', // Unit tests
    ],
    exclude: ['node_modules', '**/*.e2e.test.ts'],
    testTimeout: 30000,
  },
});
