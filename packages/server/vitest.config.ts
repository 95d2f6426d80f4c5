import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    setupFiles: ['src/__tests__/setup.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      LLM_MODEL: 'test-model',
      LLM_MAX_ATTEMPTS: '3',
      LLM_TIMEOUT_MS: '300',
      DEFAULT_TOPIC: 'Algebra',
      DEFAULT_DIFFICULTY: 'Medium',
      RATE_LIMIT_PER_MINUTE: '1000',
      PORT: '5001',
    },
    coverage: {
      provider: 'v8',
      include: ['src/services/**', 'src/utils/**', 'src/middleware/**'],
      reporter: ['text', 'lcov'],
    },
  },
});
