import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['reachline/src/**/__tests__/*.test.ts'],
    environment: 'node',
  },
});
