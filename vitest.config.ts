import { tmpdir } from 'os';
import { join } from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    // Keep debug logs out of the real home directory
    env: {
      LABKIT_LOG_DIR: join(tmpdir(), 'labkit-test-logs'),
    },
  },
});
