import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: false,
    include: ['{src,tests}/**/*.{test,spec}.ts'],
    exclude: ['**/dist/**', '**/coverage/**', '**/node_modules/**'],
    clearMocks: true,
    restoreMocks: true,
    unstubEnvs: true,
    unstubGlobals: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'json-summary'],
      reportsDirectory: 'coverage',
      exclude: ['**/dist/**', '**/coverage/**', '**/*.d.ts', '**/tests/**/*.ts', '**/testing/**'],
    },
  },
});
