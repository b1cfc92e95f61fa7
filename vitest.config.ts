import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    restoreMocks: true,
    // Keep progress logs out of test output; logger tests pass a level explicitly.
    env: { LOG_LEVEL: 'error' },
  },
});
