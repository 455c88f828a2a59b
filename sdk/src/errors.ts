export interface OldErrorContext {
  status: number;
  code: string;
  /** Field-level messages from a `{errors}` response body */
  errors?: Record<string, string>;
  headers?: Record<string, string>;
}

export class OldError extends Error {
  readonly status: number;
  readonly code: string;
  readonly errors: Record<string, string>;
  readonly headers: Record<string, string>;

  constructor(message: string, context: OldErrorContext) {
    super(message);
    this.name = 'OldError';
    this.status = context.status;
    this.code = context.code;
    this.errors = context.errors ?? {};
    this.headers = context.headers ?? {};
  }
}

export class OldAuthError extends OldError {
  constructor(message: string, context: OldErrorContext) {
    super(message, context);
    this.name = 'OldAuthError';
  }
}

export class OldForbiddenError extends OldError {
  constructor(message: string, context: OldErrorContext) {
    super(message, context);
    this.name = 'OldForbiddenError';
  }
}

export class OldNotFoundError extends OldError {
  constructor(message: string, context: OldErrorContext) {
    super(message, context);
    this.name = 'OldNotFoundError';
  }
}

export class OldValidationError extends OldError {
  constructor(message: string, context: OldErrorContext) {
    super(message, context);
    this.name = 'OldValidationError';
  }
}

export class OldServerError extends OldError {
  constructor(message: string, context: OldErrorContext) {
    super(message, context);
    this.name = 'OldServerError';
  }
}

export function createOldError(message: string, context: OldErrorContext): OldError {
  if (context.status === 401) {
    return new OldAuthError(message, context);
  }

  if (context.status === 403) {
    return new OldForbiddenError(message, context);
  }

  if (context.status === 404) {
    return new OldNotFoundError(message, context);
  }

  if (context.status === 400 || context.status === 422) {
    return new OldValidationError(message, context);
  }

  if (context.status >= 500) {
    return new OldServerError(message, context);
  }

  return new OldError(message, context);
}
