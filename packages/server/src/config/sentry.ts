import * as Sentry from '@sentry/node';

import { env } from './env.js';

// Without SENTRY_DSN (local runs, tests) the SDK stays disabled and every
// capture call is a no-op. Only 5xx responses are reported, see errorHandler.
Sentry.init({
  dsn: env.SENTRY_DSN,
  environment: env.NODE_ENV,
  enabled: Boolean(env.SENTRY_DSN),
  initialScope: {
    tags: { llm_model: env.LLM_MODEL },
  },
});

export { Sentry };
