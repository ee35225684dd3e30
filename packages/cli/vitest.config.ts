import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Test against the harness sources rather than its build output
    alias: [
      {
        find: /^@trialrun\/harness$/,
        replacement: fileURLToPath(new URL('../harness/src/index.ts', import.meta.url)),
      },
    ],
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
});
