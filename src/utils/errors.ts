/**
 * Domain error hierarchy.
 *
 * Every error a service raises on purpose is an AppError; the global
 * error handler turns it into `{ success: false, error, code }` with the
 * status mapped from its kind. Anything else is treated as a crash.
 */

export type ErrorKind =
  | 'Validation'
  | 'Conflict'
  | 'NotFound'
  | 'InvalidState'
  | 'PreconditionFailed'
  | 'DataInconsistency'
  | 'Expired'
  | 'Unauthorized';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  Validation: 400,
  Conflict: 409,
  NotFound: 404,
  InvalidState: 409,
  PreconditionFailed: 412,
  DataInconsistency: 500,
  Expired: 410,
  Unauthorized: 401,
};

const DEFAULT_CODE: Record<ErrorKind, string> = {
  Validation: 'VALIDATION_ERROR',
  Conflict: 'CONFLICT',
  NotFound: 'NOT_FOUND',
  InvalidState: 'INVALID_STATE',
  PreconditionFailed: 'PRECONDITION_FAILED',
  DataInconsistency: 'DATA_INCONSISTENCY',
  Expired: 'EXPIRED',
  Unauthorized: 'UNAUTHORIZED',
};

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly code: string;

  constructor(kind: ErrorKind, message: string, code?: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.code = code ?? DEFAULT_CODE[kind];
  }

  get statusCode(): number {
    return STATUS_BY_KIND[this.kind];
  }
}

export class ValidationError extends AppError {
  constructor(message: string, code?: string) {
    super('Validation', message, code);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code?: string) {
    super('Conflict', message, code);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, code?: string) {
    super('NotFound', message, code);
  }
}

export class InvalidStateError extends AppError {
  constructor(message: string, code?: string) {
    super('InvalidState', message, code);
  }
}

export class PreconditionFailedError extends AppError {
  constructor(message: string, code?: string) {
    super('PreconditionFailed', message, code);
  }
}

export class DataInconsistencyError extends AppError {
  constructor(message: string, code?: string) {
    super('DataInconsistency', message, code);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required', code?: string) {
    super('Unauthorized', message, code);
  }
}

/**
 * Raised for unknown, expired or no-longer-pending verification tokens.
 * `kind` says which case applied; the public routes never expose it.
 */
export class InvalidVerificationLinkError extends AppError {
  constructor(kind: 'NotFound' | 'Expired', message: string) {
    super(kind, message, kind === 'Expired' ? 'TOKEN_EXPIRED' : 'TOKEN_NOT_FOUND');
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
