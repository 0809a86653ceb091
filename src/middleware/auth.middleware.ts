import type { Request, Response, NextFunction } from 'express';
import { getCompositionRoot } from '../app/composition-root';
import type { AuthContext, InstructorRole } from '../types/auth.types';
import { AuthenticationError, AuthorizationError } from '../utils/errors';
import { roleAtLeast } from '../utils/roles';
import { logger } from '../utils/logger';

export const API_KEY_HEADER = 'x-api-key';
export const MEETING_TOKEN_HEADER = 'x-meeting-token';

function headerValue(req: Request, name: string): string | undefined {
  const raw = req.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function bearerToken(req: Request): string | undefined {
  const header = headerValue(req, 'authorization');
  if (!header || !header.startsWith('Bearer ')) return undefined;
  const token = header.substring(7).trim();
  return token || undefined;
}

/**
 * Authenticates an instructor by `Authorization: Bearer <jwt>` or `X-API-Key`
 * and attaches the result to `req.auth`.
 */
export async function authenticate(req: Request, _res: Response, next: NextFunction): Promise<void> {
  try {
    const authService = getCompositionRoot().getAuthService();
    const token = bearerToken(req);
    if (token) {
      req.auth = await authService.authenticateBearer(token);
      return next();
    }
    const apiKey = headerValue(req, API_KEY_HEADER);
    if (apiKey) {
      req.auth = await authService.authenticateApiKey(apiKey);
      return next();
    }
    throw new AuthenticationError('No valid authorization token provided');
  } catch (error) {
    if (error instanceof AuthenticationError) {
      logger.debug('auth:rejected', { path: req.path, code: error.code });
    }
    next(error);
  }
}

export function requireRole(minimum: InstructorRole) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.auth) {
      return next(new AuthenticationError());
    }
    if (!roleAtLeast(req.auth.role, minimum)) {
      logger.warn('auth:insufficient_role', {
        instructorId: req.auth.instructorId,
        role: req.auth.role,
        required: minimum,
        path: req.path,
      });
      return next(new AuthorizationError(`${minimum} access required`));
    }
    next();
  };
}

/**
 * Resolves an optional `X-Meeting-Token` into `req.meetingAccess`. Never
 * rejects; the services decide whether a password-protected meeting needs it.
 */
export function resolveMeetingAccess(req: Request, _res: Response, next: NextFunction): void {
  const token = headerValue(req, MEETING_TOKEN_HEADER);
  req.meetingAccess = getCompositionRoot().getMeetingAccessService().resolveMeetingAccess(token);
  next();
}

/** Narrows `req.auth` for handlers mounted behind `authenticate`. */
export function requireAuth(req: Request): AuthContext {
  if (!req.auth) {
    throw new AuthenticationError();
  }
  return req.auth;
}
