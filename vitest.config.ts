import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test file patterns - look in test directory
    include: ['test/**/*.{test,spec}.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    environment: 'node',
    // Keeps the logger at warn level
    env: {
      NODE_ENV: 'test',
    },
    globals: true,
  },
});
