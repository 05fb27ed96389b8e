import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      PORTAL_USERNAME: 'test-user',
      PORTAL_PASSWORD: 'test-password',
      PORTAL_AUTH_URL: 'https://auth.portal.test',
      PORTAL_API_URL: 'https://api.portal.test',
      PORTAL_URL: 'https://portal.test',
      ORGANIZATION_ID: '900000001',
      ORGANIZATION_NAME: 'TEST ORG S.A.S.',
      USER_ID: 'test-user-id',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/*.config.ts',
        'src/index.ts', // CLI entry point
        'src/testing/',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
