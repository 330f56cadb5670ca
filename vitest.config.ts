import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Sample modules are written as .cts so they compile to CommonJS.
  esbuild: {
    include: /\.(m?ts|cts|[jt]sx)$/,
  },
  test: {
    include: ['packages/*/test/**/*.test.ts', 'modules/*/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000,
  },
});
