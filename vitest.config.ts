import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'backend/tests/**/*.test.ts',
    ],
    exclude: [
      'node_modules/**',
    ],
    env: {
      LOG_LEVEL: 'silent', // keep request logs out of the reporter output
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['backend/src/**/*.ts'],
      exclude: [
        'backend/src/index.ts',
        'backend/tests/**',
        'node_modules/**',
      ],
    },
  },
});
