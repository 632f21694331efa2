import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true, // Jest-like globals such as describe, it, expect
    environment: 'node',
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
