import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['segmenter/test/**/*.test.ts'],
    environment: 'node',
  },
});
