/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node', // backend runner
    globals: true,
    reporters: 'default',
    include: ['src/tests/**/*.spec.ts'],
    testTimeout: 10_000,
  },
  esbuild: { target: 'es2022' },
});
