import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    exclude: ['**/node_modules/**', '**/dist/**', '**/*.d.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['**/src/**/*.ts'],
      exclude: ['node_modules/', 'dist/', '**/*.d.ts', '**/*.config.*', '**/*.test.ts', '**/test/**'],
    },
    // Only used by tests that call vi.useFakeTimers()
    fakeTimers: {
      toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval', 'Date'],
    },
    projects: [
      {
        extends: true,
        test: {
          name: 'common-types',
          root: './packages/common-types',
          include: ['src/**/*.test.ts'],
        },
      },
      {
        extends: true,
        test: {
          name: 'bot-client',
          root: './services/bot-client',
          include: ['src/**/*.test.ts'],
          setupFiles: ['./src/test/setup.ts'],
        },
      },
    ],
  },
});
