import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // pdf-parse's entry runs a self-test when loaded as an ES module dependency
    alias: [{ find: /^pdf-parse$/, replacement: 'pdf-parse/lib/pdf-parse.js' }],
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 10000,
  },
});
