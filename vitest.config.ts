import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: 'unit',
          include: ['tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        test: {
          name: 'integration',
          include: ['tests/integration/**/*.test.ts'],
          // PGlite boots a WASM PostgreSQL per file
          testTimeout: 30000,
          hookTimeout: 60000,
        },
      },
    ],
  },
});
