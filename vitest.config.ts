import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['worker/tests/**/*.test.ts', 'api-server/tests/**/*.test.ts'],
  },
});
