import { z } from 'zod';
import { DifficultyLevel } from '@gmat-tutor/shared';

// The API key is optional only under test, where the SDK client is mocked.
const buildEnvSchema = (isTest: boolean) =>
  z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(5000),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    ANTHROPIC_API_KEY: isTest ? z.string().optional() : z.string().min(1),
    LLM_BASE_URL: z.string().url().optional(),
    LLM_MODEL: z.string().min(1).default('claude-sonnet-4-5'),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    DEFAULT_TOPIC: z.string().trim().min(1).default('Algebra'),
    DEFAULT_DIFFICULTY: z.nativeEnum(DifficultyLevel).default(DifficultyLevel.MEDIUM),
    RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
    SENTRY_DSN: z.string().optional(),
  });

export const parseEnv = (source: NodeJS.ProcessEnv) =>
  buildEnvSchema(source.NODE_ENV === 'test').safeParse(source);

const result = parseEnv(process.env);

if (!result.success) {
  console.error('Invalid environment variables:');
  console.error(result.error.flatten().fieldErrors);
  process.exit(1);
}

export const env = result.data;
