import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 15000,
    hookTimeout: 15000,
    // BLE sessions are process-wide singletons in real use; keep tests sequential
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true
      }
    },
    // ALWAYS run once and exit, never watch
    watch: false,
    env: {
      PIXEL_BRIDGE_LOG_LEVEL: 'error'
    }
  },
});
