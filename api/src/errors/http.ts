/**
 * HTTP-facing Errors
 *
 * Thrown by services and mapped onto the wire format by the error handler
 * middleware: `{errors: {...}}` for field-level failures, `{error: "..."}`
 * for everything else.
 */

export type FieldErrors = Record<string, string>;

export class HttpError extends Error {
  constructor(
    readonly status: 400 | 401 | 403 | 404,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, message);
    this.name = 'BadRequestError';
  }
}

export class ForbiddenError extends HttpError {
  constructor(message: string = UNAUTHORIZED_MESSAGE) {
    super(403, message);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

/**
 * Field-level validation failure
 */
export class InvalidInputError extends Error {
  readonly status = 400 as const;

  constructor(readonly errors: FieldErrors) {
    super(`Invalid input: ${Object.keys(errors).join(', ')}`);
    this.name = 'InvalidInputError';
  }
}

export const UNAUTHORIZED_MESSAGE = 'You are not authorized to access this resource.';
export const UNAUTHENTICATED_MESSAGE = 'Authentication is required to access this resource.';
export const JSON_DECODE_ERROR_MESSAGE =
  'JSON decode error: the parameters provided were not valid JSON.';
export const READ_ONLY_MESSAGE = 'This resource is read-only.';
export const NOT_NEW_MESSAGE = 'The update request failed because the submitted data were not new.';
