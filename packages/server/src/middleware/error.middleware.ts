import type { Request, Response, NextFunction } from 'express';
import { ErrorCode, type ApiErrorResponse } from '@gmat-tutor/shared';

import { Sentry } from '../config/sentry.js';
import { createLogger } from '../config/logger.js';
import { AppError, BadRequestError } from '../utils/errors.js';

const logger = createLogger('error-handler');

// body-parser rejects malformed or oversized JSON with a 4xx `status` before
// any route runs; those are caller errors, not server faults.
const toBodyParserError = (err: Error): BadRequestError | null => {
  if (!('status' in err) || typeof err.status !== 'number') return null;
  if (err.status < 400 || err.status >= 500) return null;
  return new BadRequestError('Request body could not be parsed', err.message);
};

const sendAppError = (res: Response, err: AppError): void => {
  const body: ApiErrorResponse = {
    error: {
      code: err.code,
      message: err.message,
      details: err.details,
    },
  };
  res.status(err.statusCode).json(body);
};

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction,
) => {
  const appError = err instanceof AppError ? err : toBodyParserError(err);

  // 4xx: caller errors, not reported.
  if (appError !== null && appError.statusCode < 500) {
    sendAppError(res, appError);
    return;
  }

  const requestId = req.requestId;
  const context = { requestId, method: req.method, path: req.path };

  // 5xx from the pipeline (exhausted validation, upstream failure). The message
  // is meant for the caller, so it is returned as is.
  if (appError !== null) {
    logger.error({ err, ...context, code: appError.code }, 'Pipeline error');
    Sentry.captureException(err, { extra: context });
    sendAppError(res, appError);
    return;
  }

  logger.error({ err, ...context }, 'Unhandled error');
  Sentry.captureException(err, { extra: context });

  res.status(500).json({
    error: {
      code: ErrorCode.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
    },
  });
};
