/**
 * Application error taxonomy. The error middleware maps each class to its
 * status code; anything else becomes a 500 with a generic message.
 */

export interface FieldIssue {
  field: string;
  message: string;
}

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: FieldIssue[];

  constructor(statusCode: number, code: string, message: string, details?: FieldIssue[]) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details: FieldIssue[] = []) {
    super(400, 'VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

export class AuthError extends AppError {
  constructor(message = 'Could not validate credentials') {
    super(401, 'AUTH_ERROR', message);
    this.name = 'AuthError';
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(404, 'NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, 'CONFLICT', message);
    this.name = 'ConflictError';
  }
}

export class ImportError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(500, 'IMPORT_ERROR', cause === undefined ? message : `${message}: ${describeError(cause)}`);
    this.name = 'ImportError';
    this.cause = cause;
  }
}

export class StoreError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(500, 'STORE_ERROR', message);
    this.name = 'StoreError';
    this.cause = cause;
  }
}

/**
 * Message of an error-like value. Errors raised by Node internals may come
 * from another realm, so this checks the shape rather than `instanceof Error`.
 */
export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') return message;
  }
  return String(error);
}
