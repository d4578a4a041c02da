import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['{apps,packages,tools}/*/src/**/__tests__/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'error',
    },
  },
});
