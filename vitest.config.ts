import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['{lib,middlewares,modules,tools}/**/*.test.ts'],
  },
});
