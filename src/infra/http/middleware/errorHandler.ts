import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  ConflictError,
  ForbiddenError,
  InvalidInputError,
  NotFoundError,
  UnauthorizedError,
} from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors. `code` names the error
 * kind and is stable; `message` is for humans.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface ErrorMapping {
  type: new (...args: never[]) => Error;
  status: number;
  code: string;
}

const APPLICATION_ERRORS: ErrorMapping[] = [
  { type: InvalidInputError, status: 400, code: 'INVALID_INPUT' },
  { type: UnauthorizedError, status: 401, code: 'UNAUTHORIZED' },
  { type: ForbiddenError, status: 403, code: 'FORBIDDEN' },
  { type: NotFoundError, status: 404, code: 'NOT_FOUND' },
  { type: ConflictError, status: 409, code: 'CONFLICT' },
];

/**
 * body-parser marks unparseable JSON with `type: 'entity.parse.failed'`.
 */
function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    };
    res.status(400).json(response);
    return;
  }

  const error = isBodyParseError(err) ? new InvalidInputError('Malformed JSON body') : err;

  const mapping = APPLICATION_ERRORS.find((m) => error instanceof m.type);
  if (mapping) {
    const response: ErrorResponse = {
      code: mapping.code,
      message: error.message,
    };
    res.status(mapping.status).json(response);
    return;
  }

  req.log.error({ err }, 'Unhandled error');

  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}

/**
 * Fallback for requests that matched no route.
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
}
