import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/core/src/**/*.test.ts', 'apps/kubetun-cli/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15000,
    disableConsoleIntercept: true,
  },
});
