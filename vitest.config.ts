import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['__tests__/**/*.test.ts'],
    // Tests swap process-level runtime settings (output mode, warnings)
    pool: 'forks',
  },
});
