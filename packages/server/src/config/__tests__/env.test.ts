import { describe, it, expect } from 'vitest';
import { DifficultyLevel } from '@gmat-tutor/shared';

import { parseEnv } from '../env.js';

describe('parseEnv', () => {
  it('applies defaults for every optional setting', () => {
    const result = parseEnv({ NODE_ENV: 'test' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({
        NODE_ENV: 'test',
        PORT: 5000,
        LOG_LEVEL: 'info',
        LLM_MODEL: 'claude-sonnet-4-5',
        LLM_TIMEOUT_MS: 30000,
        LLM_MAX_ATTEMPTS: 3,
        DEFAULT_TOPIC: 'Algebra',
        DEFAULT_DIFFICULTY: DifficultyLevel.MEDIUM,
        RATE_LIMIT_PER_MINUTE: 60,
      });
    }
  });

  it('requires ANTHROPIC_API_KEY outside of tests', () => {
    const result = parseEnv({ NODE_ENV: 'production' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.flatten().fieldErrors.ANTHROPIC_API_KEY).toBeDefined();
    }
  });

  it('accepts a production configuration with a key', () => {
    const result = parseEnv({
      NODE_ENV: 'production',
      ANTHROPIC_API_KEY: 'test-secret',
      PORT: '8080',
      LLM_MAX_ATTEMPTS: '5',
      DEFAULT_DIFFICULTY: 'Hard',
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.PORT).toBe(8080);
      expect(result.data.LLM_MAX_ATTEMPTS).toBe(5);
      expect(result.data.DEFAULT_DIFFICULTY).toBe(DifficultyLevel.HARD);
    }
  });

  it('rejects an attempt budget outside 1-10', () => {
    expect(parseEnv({ NODE_ENV: 'test', LLM_MAX_ATTEMPTS: '0' }).success).toBe(false);
    expect(parseEnv({ NODE_ENV: 'test', LLM_MAX_ATTEMPTS: '11' }).success).toBe(false);
  });

  it('rejects an unknown default difficulty', () => {
    expect(parseEnv({ NODE_ENV: 'test', DEFAULT_DIFFICULTY: 'medium' }).success).toBe(false);
  });
});
