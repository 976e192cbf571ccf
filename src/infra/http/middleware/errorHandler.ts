import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import type { Logger } from 'pino';
import {
  ConcurrencyError,
  DuplicateResourceError,
  NotFoundError,
} from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors.
 * `errors` maps field -> message and is only present on validation failures.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  errors?: Record<string, string>;
  details?: object;
}

interface ErrorMapping {
  status: number;
  body: ErrorResponse;
}

/**
 * First message per field; issues on the body itself are keyed `body`.
 */
export function toFieldErrors(error: ZodError): Record<string, string> {
  const errors: Record<string, string> = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
    if (!(field in errors)) {
      errors[field] = issue.message;
    }
  }
  return errors;
}

// express.json() rejects unparsable bodies with a SyntaxError tagged by body-parser
function isBodyParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

export function mapError(err: unknown): ErrorMapping {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        errors: toFieldErrors(err),
      },
    };
  }

  if (isBodyParseError(err)) {
    return {
      status: 400,
      body: { code: 'MALFORMED_JSON', message: 'Malformed request body' },
    };
  }

  if (err instanceof NotFoundError) {
    return { status: 404, body: { code: 'NOT_FOUND', message: err.message } };
  }

  if (err instanceof DuplicateResourceError) {
    return { status: 409, body: { code: 'DUPLICATE_RESOURCE', message: err.message } };
  }

  if (err instanceof ConcurrencyError) {
    return {
      status: 409,
      body: {
        code: 'CONCURRENCY_CONFLICT',
        message: err.message,
        details: {
          expectedVersion: err.expectedVersion,
          actualVersion: err.actualVersion,
        },
      },
    };
  }

  return {
    status: 500,
    body: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
  };
}

/**
 * Must be mounted last.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const { status, body } = mapError(err);

    if (status >= 500) {
      logger.error({ err, method: req.method, url: req.originalUrl }, 'Unhandled error');
    } else {
      logger.warn(
        { code: body.code, method: req.method, url: req.originalUrl },
        body.message
      );
    }

    res.status(status).json(body);
  };
}
