/**
 * Vitest configuration for unit and integration tests.
 */

import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const srcDir = fileURLToPath(new URL('./src', import.meta.url));
const testsDir = fileURLToPath(new URL('./tests', import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts', 'src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 10_000,
  },
  resolve: {
    alias: [
      { find: /^@\/tests\//, replacement: `${testsDir}/` },
      { find: /^@\//, replacement: `${srcDir}/` },
    ],
  },
});
