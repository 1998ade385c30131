import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      ANTHROPIC_API_KEY: 'test-key',
      LLM_RETRY_DELAY_MS: '0',
    },
    coverage: {
      provider: 'v8',
      include: ['src/services/**', 'src/utils/**'],
      reporter: ['text', 'lcov'],
    },
  },
});
