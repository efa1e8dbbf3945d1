import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // The CLI tests patch console and process.exitCode; keep files sequential.
    fileParallelism: false,
  },
});
