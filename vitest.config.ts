import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    env: {
      // Codec warnings are asserted through return values, not log output
      LOG_LEVEL: 'silent',
    },
  },
});
