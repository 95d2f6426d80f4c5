import { ErrorCode } from '@gmat-tutor/shared';

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
  }
}

/** Caller input failed local shape or enum checks. No external call was made. */
export class BadRequestError extends AppError {
  readonly statusCode = 400;
  readonly code = ErrorCode.BAD_REQUEST;
}

/** The generative service kept returning output that never matched the schema. */
export class ValidationError extends AppError {
  readonly statusCode = 500;
  readonly code = ErrorCode.GENERATION_VALIDATION_FAILED;
}

/** The generative service was unreachable or answered with a transport-level failure. */
export class UpstreamError extends AppError {
  readonly statusCode: number = 502;
  readonly code: ErrorCode = ErrorCode.UPSTREAM_ERROR;
}

export class UpstreamTimeoutError extends UpstreamError {
  readonly statusCode: number = 504;
  readonly code: ErrorCode = ErrorCode.UPSTREAM_TIMEOUT;
}
