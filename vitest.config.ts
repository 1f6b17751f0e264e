import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const fromRoot = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@api': fromRoot('./src/api'),
      '@config': fromRoot('./src/config'),
      '@core': fromRoot('./src/core'),
      '@infra': fromRoot('./src/infrastructure'),
      '@middleware': fromRoot('./src/middleware'),
      '@services': fromRoot('./src/services'),
      '@test': fromRoot('./src/test'),
      '@utils': fromRoot('./src/utils'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./src/test/setupEnv.ts'],
  },
});
