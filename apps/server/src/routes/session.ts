import { Router } from 'express';
import {
  loginRequestSchema,
  type ErrorResponse,
  type LoadOptions,
  type LoginResponse,
  type SessionInfo,
} from '@commute-dashboard/core';
import { passwordMatches } from '../auth/password.js';
import { bearerToken, isAuthenticated, type AuthContext } from '../auth/middleware.js';

export interface SessionRouteSettings {
  refreshIntervalMs: number;
  loadOptions: LoadOptions;
}

function chartTimeZone(loadOptions: LoadOptions): string {
  return loadOptions.timeMode.kind === 'zoned' ? loadOptions.timeMode.timeZone : 'naive';
}

/**
 * `GET /session`, `POST /login` and `POST /logout`.
 */
export function sessionRouter(auth: AuthContext, settings: SessionRouteSettings): Router {
  const router = Router();

  router.get('/session', (req, res) => {
    const body: SessionInfo = {
      passwordRequired: auth.password !== undefined,
      authenticated: isAuthenticated(auth, req),
      refreshIntervalMs: settings.refreshIntervalMs,
      timeZone: chartTimeZone(settings.loadOptions),
    };
    res.json(body);
  });

  router.post('/login', (req, res) => {
    if (auth.password === undefined) {
      const body: ErrorResponse = { error: 'password login is disabled' };
      res.status(400).json(body);
      return;
    }

    const parsed = loginRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const body: ErrorResponse = { error: 'password is required' };
      res.status(400).json(body);
      return;
    }

    if (!passwordMatches(auth.password, parsed.data.password)) {
      const body: ErrorResponse = { error: 'incorrect password' };
      res.status(401).json(body);
      return;
    }

    const body: LoginResponse = { token: auth.sessions.create() };
    res.json(body);
  });

  router.post('/logout', (req, res) => {
    const token = bearerToken(req);
    if (token !== undefined) {
      auth.sessions.revoke(token);
    }
    res.status(204).end();
  });

  return router;
}
