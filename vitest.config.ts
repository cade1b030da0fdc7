import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    onConsoleLog(log) {
      // Suppress expected warnings from the registry and bridge
      if (/\[jail[:\]]/.test(log)) return false;
    },
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
