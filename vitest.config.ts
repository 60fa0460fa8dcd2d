import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tank-bridge/test/**/*.test.ts']
  }
});
