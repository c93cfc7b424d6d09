import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // The service imports the library by package name; resolve it to the sources
    alias: [
      {
        find: /^policy-query-filter\/elasticsearch$/,
        replacement: fileURLToPath(new URL('./src/elasticsearch/index.ts', import.meta.url)),
      },
      {
        find: /^policy-query-filter$/,
        replacement: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
      },
    ],
  },
  test: {
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: ['tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        extends: true,
        test: {
          name: 'service',
          include: ['filter-service/tests/**/*.test.ts'],
          testTimeout: 10000,
        },
      },
    ],
  },
});
