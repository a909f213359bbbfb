/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node', // backend runner
    globals: true,
    reporters: 'default',
    include: ['src/tests/**/*.test.ts'],
  },
  esbuild: { target: 'es2022' },
});
