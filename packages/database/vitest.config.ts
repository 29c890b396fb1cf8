import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Concurrency tests hold real timers; keep headroom over charge timeouts
    testTimeout: 15000,
  },
});
