import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['shared/*/{src,tests}/**/*.test.ts', 'services/*/{src,tests}/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
    env: { LOG_LEVEL: 'error' },
  },
});
