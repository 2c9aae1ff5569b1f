import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/test/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      JWT_SECRET: 'test-secret',
      SERVICE_SECRET: 'test-service-secret',
      PROJECTS_SERVICE_URL: 'http://projects.test',
      ACTIVITY_SERVICE_URL: 'http://activity.test',
      PERFORMANCE_SERVICE_URL: 'http://performance.test',
      LABS_SERVICE_URL: 'http://labs.test',
      PROXY_TIMEOUT_MS: '500',
      PROXY_MAX_RETRIES: '1',
      PROXY_RETRY_DELAY_MS: '0',
      HEALTH_TIMEOUT_MS: '500',
      DASHBOARD_DEADLINE_MS: '2000',
      BCRYPT_ROUNDS: '4',
    },
  },
});
