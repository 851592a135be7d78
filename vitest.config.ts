// vitest.config.ts
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'happy-dom', // Canvas, window and keyboard events for the client tests
    globals: true,
    include: ['src/**/*.test.ts'],
  },
});
