import type { NextFunction, Request, RequestHandler, Response } from 'express';

type Params = Record<string, string>;

/**
 * Forwards a rejected promise from an async route handler to next(), so the
 * global errorHandler formats it. ReqBody types the body that validate()
 * has already parsed.
 */
export const asyncHandler =
  <ReqBody = unknown>(
    fn: (req: Request<Params, unknown, ReqBody>, res: Response, next: NextFunction) => Promise<void>,
  ): RequestHandler<Params, unknown, ReqBody> =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };
