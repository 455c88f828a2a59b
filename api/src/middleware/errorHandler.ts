/**
 * Error Handler
 *
 * Registered with app.onError. Maps service errors, zod failures and
 * malformed request bodies onto the JSON error bodies clients expect:
 * - {errors: {field: message}} for field-level validation failures
 * - {error: message} for everything else
 */

import type { Context, ErrorHandler, NotFoundHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import {
  HttpError,
  InvalidInputError,
  JSON_DECODE_ERROR_MESSAGE,
  type FieldErrors,
} from '@/errors/http';
import { SearchParseError } from '@/services/queryBuilder';
import { logger } from '@/utils/logger';

export interface ErrorBody {
  error: string;
}

export interface ValidationErrorBody {
  errors: FieldErrors;
}

// Only show raw messages of unexpected errors in development and test
function isVerboseErrors(): boolean {
  const env = process.env.NODE_ENV;
  return env === 'development' || env === 'test';
}

/**
 * Flatten zod issues into `{path: message}`; the first issue per path wins
 */
export function zodIssuesToFieldErrors(error: ZodError): FieldErrors {
  const errors: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : 'body';
    if (!(key in errors)) {
      errors[key] = issue.message;
    }
  }
  return errors;
}

export const errorHandler: ErrorHandler = (error, c: Context) => {
  if (error instanceof InvalidInputError || error instanceof SearchParseError) {
    return c.json<ValidationErrorBody>({ errors: error.errors }, 400);
  }

  if (error instanceof ZodError) {
    return c.json<ValidationErrorBody>({ errors: zodIssuesToFieldErrors(error) }, 400);
  }

  if (error instanceof HttpError) {
    return c.json<ErrorBody>({ error: error.message }, error.status);
  }

  // hono's validator throws this for bodies that are not JSON
  if (error instanceof HTTPException) {
    if (error.status === 400 && error.message.startsWith('Malformed JSON')) {
      return c.json<ErrorBody>({ error: JSON_DECODE_ERROR_MESSAGE }, 400);
    }
    return error.getResponse();
  }

  logger.error('Unhandled error', {
    error: String(error),
    stack: error.stack,
    cause: error.cause ? String(error.cause) : undefined,
    path: c.req.path,
    method: c.req.method,
  });

  return c.json<ErrorBody>(
    { error: isVerboseErrors() ? error.message : 'An internal error occurred' },
    500
  );
};

export const notFoundHandler: NotFoundHandler = (c) => {
  return c.json<ErrorBody>({ error: 'The resource could not be found.' }, 404);
};
