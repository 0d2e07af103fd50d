import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@\//, replacement: fileURLToPath(new URL('./apps/client/src/', import.meta.url)) },
      { find: /^@chatsync\/protocol$/, replacement: fileURLToPath(new URL('./packages/protocol/src/index.ts', import.meta.url)) },
      { find: /^@chatsync\/protocol\/(.*)$/, replacement: fileURLToPath(new URL('./packages/protocol/src/$1.ts', import.meta.url)) },
    ],
  },
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    testTimeout: 10_000,
    globals: false,
  },
});
