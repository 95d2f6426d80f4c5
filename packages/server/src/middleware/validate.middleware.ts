import type { Request, Response, NextFunction } from 'express';
import type { ZodSchema } from 'zod';

import { BadRequestError } from '../utils/errors.js';

/**
 * Validates req.body against a Zod schema before any service code runs.
 * On success the parsed (trimmed, defaulted) value replaces req.body.
 * On failure a BadRequestError listing every failing field goes to next().
 */
export const validate = (schema: ZodSchema) => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      next(
        new BadRequestError(
          'Invalid request body',
          result.error.issues.map((issue) => ({
            field: issue.path.join('.'),
            message: issue.message,
          })),
        ),
      );
      return;
    }
    req.body = result.data;
    next();
  };
};
