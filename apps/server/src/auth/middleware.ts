import type { Request, RequestHandler } from 'express';
import type { ErrorResponse } from '@commute-dashboard/core';
import type { SessionStore } from './sessions.js';

/**
 * What the password gate needs to decide on a request.
 */
export interface AuthContext {
  /** Configured password; undefined leaves the dashboard open */
  password: string | undefined;
  sessions: SessionStore;
}

export function bearerToken(req: Request): string | undefined {
  const header = req.get('authorization');
  const match = header === undefined ? null : /^Bearer\s+(\S+)$/i.exec(header);
  return match ? match[1] : undefined;
}

export function isAuthenticated(auth: AuthContext, req: Request): boolean {
  if (auth.password === undefined) {
    return true;
  }
  const token = bearerToken(req);
  return token !== undefined && auth.sessions.isValid(token);
}

/**
 * Rejects requests without a valid session token with 401 when a password is configured.
 */
export function requireSession(auth: AuthContext): RequestHandler {
  return (req, res, next) => {
    if (isAuthenticated(auth, req)) {
      next();
      return;
    }
    const body: ErrorResponse = { error: 'authentication required' };
    res.status(401).json(body);
  };
}
