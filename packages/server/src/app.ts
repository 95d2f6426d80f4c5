// Sentry must be initialised before any other imports so it can instrument
// the Express request lifecycle from the start.
import './config/sentry.js';

import express, { type Request, type Response } from 'express';
import helmet from 'helmet';
import { pinoHttp } from 'pino-http';
import { ErrorCode } from '@gmat-tutor/shared';

import { createLogger } from './config/logger.js';
import { apiRouter } from './routes/index.js';
import { globalRateLimiter } from './middleware/rateLimiter.middleware.js';
import { requestIdMiddleware } from './middleware/requestId.middleware.js';
import { errorHandler } from './middleware/error.middleware.js';

export const createApp = () => {
  const app = express();
  const logger = createLogger('server');

  // requestIdMiddleware must be first so req.requestId is set before anything
  // can throw (e.g. express.json() on a malformed body).
  app.use(requestIdMiddleware);
  app.use(helmet());
  app.use(express.json({ limit: '100kb' }));
  app.use(pinoHttp<Request, Response>({ logger, genReqId: (req) => req.requestId }));
  app.use(globalRateLimiter);

  app.use(apiRouter);

  app.use((_req, res) => {
    res.status(404).json({
      error: {
        code: ErrorCode.NOT_FOUND,
        message: 'Route not found',
      },
    });
  });

  // errorHandler reports only 5xx to Sentry; Sentry.setupExpressErrorHandler
  // would capture 4xx caller errors as well.
  app.use(errorHandler);

  return app;
};
