import { Request, Response, NextFunction } from 'express';
import pg from 'pg';
import { AppError, describeError, NotFoundError, StoreError, ValidationError } from '../errors.js';
import { logger } from '../config/logger.js';

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
}

/** Status set by body-parser and other http-errors style middleware */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

function toAppError(err: unknown): AppError | null {
  if (err instanceof AppError) return err;
  if (err instanceof pg.DatabaseError) return new StoreError('Database error', err);

  if (typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed') {
    return new ValidationError('Malformed request body', [
      { field: 'body', message: describeError(err) },
    ]);
  }
  const status = clientErrorStatus(err);
  if (status === 400) return new ValidationError(describeError(err));
  if (status !== null) return new AppError(status, 'CLIENT_ERROR', describeError(err));
  return null;
}

/**
 * Translate errors into `{ error, details? }` responses with the status
 * carried by the error class. Unknown errors become 500s with a generic message.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const appError = toAppError(err);
  const status = appError?.statusCode ?? 500;

  if (status >= 500) {
    logger.error('Request failed', { path: req.path, method: req.method, error: err });
  } else {
    logger.debug('Request rejected', { path: req.path, status, error: appError?.message });
  }

  if (status === 401) {
    res.setHeader('WWW-Authenticate', 'Bearer');
  }

  res.status(status).json({
    error: appError?.message ?? 'Internal server error',
    ...(appError?.details && appError.details.length > 0 ? { details: appError.details } : {}),
  });
}
