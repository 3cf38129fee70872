import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tintag-core/src/**/*.test.ts', 'tintag-cli/src/**/*.test.ts'],
    environment: 'node',
  },
});
