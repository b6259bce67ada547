import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/src/**/__tests__/**/*.test.ts', 'apps/*/test/**/*.test.ts'],
    restoreMocks: true,
  },
});
