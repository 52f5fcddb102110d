import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Rooted at the repository: with this package's directory as root, Vitest 3
    // mistakes bare imports starting with "st" (e.g. 'stream') for its own files.
    root: fileURLToPath(new URL('../..', import.meta.url)),
    name: 'platform-core',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['packages/platform-core/src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
