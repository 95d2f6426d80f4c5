import { randomUUID } from 'crypto';

import type { Request, Response, NextFunction } from 'express';

import { createLogger } from '../config/logger.js';

const rootLogger = createLogger('server');

// Attaches a request ID to every incoming request:
//   - req.requestId: error-log and Sentry context, X-Request-Id header
//   - req.log: child logger with requestId bound
// A caller-supplied X-Request-Id is reused so the automation tool can
// correlate its own run logs with ours.
export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const incoming = req.get('X-Request-Id');
  const requestId = incoming && /^[\w-]{1,64}$/.test(incoming) ? incoming : randomUUID();
  req.requestId = requestId;
  req.log = rootLogger.child({ requestId });
  res.setHeader('X-Request-Id', requestId);
  next();
};
