import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['hello-names/src/**/*.test.ts'],
    environment: 'node'
  }
});
