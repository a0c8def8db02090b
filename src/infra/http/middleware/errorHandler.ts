import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { EmptyCredentialError, TokenInvalidError } from '../../../domain/auth/errors.js';
import {
  ConflictError,
  DuplicateEmailError,
  InvalidCredentialsError,
  NotFoundError,
  TimeoutError,
  UnauthorizedError,
  UserNotFoundError,
} from '../../../application/errors.js';
import { logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

function isBodyParserSyntaxError(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

function send(res: Response, status: number, response: ErrorResponse): void {
  res.status(status).json(response);
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  // Handle Zod validation errors
  if (err instanceof ZodError) {
    send(res, 400, {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    });
    return;
  }

  // Malformed JSON body (express.json)
  if (isBodyParserSyntaxError(err)) {
    send(res, 400, { code: 'INVALID_JSON', message: 'Invalid JSON body' });
    return;
  }

  if (err instanceof EmptyCredentialError) {
    send(res, 400, { code: 'EMPTY_CREDENTIAL', message: err.message });
    return;
  }

  // Unknown email and wrong password share this branch and message
  if (err instanceof InvalidCredentialsError) {
    send(res, 401, { code: 'INVALID_CREDENTIALS', message: err.message });
    return;
  }

  if (err instanceof TokenInvalidError || err instanceof UnauthorizedError) {
    send(res, 401, { code: 'UNAUTHORIZED', message: err.message });
    return;
  }

  if (err instanceof UserNotFoundError) {
    send(res, 404, { code: 'USER_NOT_FOUND', message: err.message });
    return;
  }

  if (err instanceof NotFoundError) {
    send(res, 404, { code: 'NOT_FOUND', message: err.message });
    return;
  }

  if (err instanceof DuplicateEmailError) {
    send(res, 409, { code: 'DUPLICATE_EMAIL', message: err.message });
    return;
  }

  if (err instanceof ConflictError) {
    send(res, 409, { code: 'CONFLICT', message: err.message });
    return;
  }

  if (err instanceof TimeoutError) {
    logger.warn('Request deadline exceeded', {
      method: req.method,
      path: req.originalUrl,
      operation: err.operation,
    });
    send(res, 504, { code: 'TIMEOUT', message: 'Request timed out' });
    return;
  }

  // Hashing and persistence failures, and anything unexpected
  logger.error('Unhandled request error', {
    method: req.method,
    path: req.originalUrl,
    name: err.name,
    error: err.message,
  });
  send(res, 500, { code: 'INTERNAL_ERROR', message: 'Internal server error' });
}
