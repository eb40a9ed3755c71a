import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    // Node 20 has no native decorators; have esbuild lower them.
    target: 'es2022',
  },
  test: {
    include: ['tests/**/*.test.ts'],
  },
});
