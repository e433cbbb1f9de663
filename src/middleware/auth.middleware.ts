import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthService } from '../services/auth/auth.service.js';
import { AuthError } from '../errors.js';
import { logger } from '../config/logger.js';
import { User } from '../types/models.js';

// Extend Express Request type to include the authenticated user
declare global {
  namespace Express {
    interface Request {
      user?: User;
      apiKeyAuth?: boolean;
    }
  }
}

/**
 * Extract the token from an `Authorization: Bearer <token>` header
 */
export function getBearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header) return null;

  const [scheme, token] = header.split(' ');
  if (scheme?.toLowerCase() !== 'bearer' || !token) return null;
  return token;
}

/**
 * Require a valid bearer token; sets req.user
 */
export function requireAuth(auth: AuthService): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    const token = getBearerToken(req);
    if (!token) {
      next(new AuthError('Not authenticated'));
      return;
    }

    try {
      req.user = await auth.authenticate(token);
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Compare the X-API-Key header against the configured admin key
 */
export function validateApiKey(req: Request, apiKey: string | undefined): boolean {
  const provided = req.headers['x-api-key'];

  if (typeof provided !== 'string' || !apiKey) {
    return false;
  }

  const a = Buffer.from(provided);
  const b = Buffer.from(apiKey);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Allow either the admin API key or a valid bearer token.
 * Used for administrative endpoints such as bulk import.
 */
export function requireAuthOrApiKey(auth: AuthService, apiKey: string | undefined): RequestHandler {
  const bearer = requireAuth(auth);

  return (req: Request, res: Response, next: NextFunction): void => {
    if (validateApiKey(req, apiKey)) {
      req.apiKeyAuth = true;
      next();
      return;
    }

    if (req.headers['x-api-key'] !== undefined) {
      logger.warn('Rejected admin API key', { path: req.path });
    }

    void bearer(req, res, next);
  };
}
