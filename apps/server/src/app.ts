import express, { type ErrorRequestHandler, type Express } from 'express';
import type { ErrorResponse } from '@commute-dashboard/core';
import { requireSession, type AuthContext } from './auth/middleware.js';
import type { SessionStore } from './auth/sessions.js';
import { itinerariesRouter } from './routes/itineraries.js';
import { sessionRouter } from './routes/session.js';
import type { CommuteDataService } from './services/commuteData.js';
import type { ServerSettings } from './settings.js';

/**
 * Everything the HTTP layer needs, created once by the caller.
 */
export interface AppDependencies {
  settings: Pick<ServerSettings, 'password' | 'staticDir' | 'refreshIntervalMs' | 'loadOptions'>;
  sessions: SessionStore;
  commuteData: CommuteDataService;
}

function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number' && status >= 400 && status < 500) {
      return status;
    }
  }
  return undefined;
}

const errorHandler: ErrorRequestHandler = (error: unknown, req, res, _next) => {
  const status = clientErrorStatus(error);
  if (status !== undefined) {
    const body: ErrorResponse = { error: error instanceof Error ? error.message : 'bad request' };
    res.status(status).json(body);
    return;
  }

  console.error(`[app] ${req.method} ${req.originalUrl} failed`, error);
  const body: ErrorResponse = { error: 'Internal server error' };
  res.status(500).json(body);
};

/**
 * Builds the dashboard HTTP application: JSON API under /api and, when
 * configured, the built web app.
 */
export function createApp({ settings, sessions, commuteData }: AppDependencies): Express {
  const auth: AuthContext = { password: settings.password, sessions };
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '16kb' }));

  app.use('/api', sessionRouter(auth, settings));
  app.use('/api/itineraries', requireSession(auth), itinerariesRouter(commuteData));
  app.use('/api', (_req, res) => {
    const body: ErrorResponse = { error: 'not found' };
    res.status(404).json(body);
  });

  if (settings.staticDir !== undefined) {
    app.use(express.static(settings.staticDir));
  }

  app.use(errorHandler);
  return app;
}
