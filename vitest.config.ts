import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['sdks/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
