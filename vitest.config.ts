import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relativePath: string) =>
  fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['src/tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      ADMIN_API_KEY: 'test-admin-key',
      TRANSACTION_CALLBACK_BASE_URL: 'https://world.test:9000',
      ENABLE_STALE_HOLD_SWEEP: 'false'
    },
    coverage: {
      provider: 'v8',
      reportsDirectory: 'coverage'
    }
  },
  resolve: {
    alias: {
      '@config': fromRoot('./src/config/index.ts'),
      '@controllers': fromRoot('./src/controllers'),
      '@services': fromRoot('./src/services'),
      '@clients': fromRoot('./src/clients'),
      '@infra': fromRoot('./src/infra'),
      '@lib': fromRoot('./src/lib'),
      '@middlewares': fromRoot('./src/middlewares'),
      '@routes': fromRoot('./src/routes'),
      '@app-types': fromRoot('./src/types')
    }
  }
});
