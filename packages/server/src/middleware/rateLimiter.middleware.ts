import rateLimit from 'express-rate-limit';
import { ErrorCode } from '@gmat-tutor/shared';

import { env } from '../config/env.js';

const MINUTE_MS = 60 * 1000;

export const createRateLimiter = (
  windowMs: number,
  max: number,
  message = 'Too many requests, please try again later',
) =>
  rateLimit({
    windowMs,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    message: {
      error: { code: ErrorCode.RATE_LIMITED, message },
    },
  });

export const globalRateLimiter = createRateLimiter(MINUTE_MS, env.RATE_LIMIT_PER_MINUTE * 5);

// Every request through this limiter costs one or more billable upstream calls.
export const generationRateLimiter = createRateLimiter(
  MINUTE_MS,
  env.RATE_LIMIT_PER_MINUTE,
  `Generation limit reached. You can make up to ${env.RATE_LIMIT_PER_MINUTE} generation requests per minute.`,
);
