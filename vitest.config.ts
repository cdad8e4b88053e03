import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/*/src/**/*.test.ts', // Engine unit tests
      'apps/*/src/**/*.test.ts', // Console front end and benches
    ],
  },
});
