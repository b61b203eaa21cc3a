/**
 * Request-level errors and their HTTP responses
 */

import { ErrorCode, type ErrorResponse } from '@keyshare-gate/shared';

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}

/**
 * Shape any thrown value into a status code and body
 * Messages of unexpected errors are hidden in production
 */
export function toErrorResponse(
  error: unknown,
  nodeEnv: string | undefined = process.env.NODE_ENV
): { statusCode: number; body: ErrorResponse } {
  if (isHttpError(error)) {
    return {
      statusCode: error.statusCode,
      body: {
        error: error.code,
        code: error.code,
        message: error.message,
        ...(error.details === undefined ? {} : { details: error.details }),
      },
    };
  }

  const message =
    nodeEnv === 'production' || !(error instanceof Error) ? 'Internal server error' : error.message;

  return {
    statusCode: 500,
    body: { error: ErrorCode.INTERNAL_ERROR, code: ErrorCode.INTERNAL_ERROR, message },
  };
}
