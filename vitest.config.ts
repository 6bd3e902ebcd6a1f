import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'error',
      LOG_FILE_ENABLED: 'false',
      LOG_SILENT: 'true',
    },
  },
});
