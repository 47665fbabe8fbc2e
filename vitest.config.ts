import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts'],
    },
    // Keep logger output away from the test reporter
    env: {
      LOG_LEVEL: 'silent',
      LOG_PRETTY: 'false',
      NODE_ENV: 'test',
    },
  },
});
