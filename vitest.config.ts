import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist', 'temp'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['dist/**', 'temp/**', '**/*.d.ts', '**/test-fixtures.ts'],
    },
  },
});
