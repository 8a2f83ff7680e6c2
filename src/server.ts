// ═══════════════════════════════════════════════════════════════════════════════
// SERVER — Express Application Assembly
// ═══════════════════════════════════════════════════════════════════════════════

import express, { type Express } from 'express';
import { requestContext } from './api/middleware/request-context.js';
import { errorHandler, NotFoundError } from './api/middleware/error-handler.js';
import { createApiRouter, createHealthRouter } from './api/routes/index.js';
import type { ServerConfig } from './config/index.js';
import type { SearchSessionService } from './services/session/service.js';
import type { KeyValueStore } from './storage/index.js';

export interface AppDeps {
  readonly sessions: SearchSessionService;
  readonly server: ServerConfig;
  readonly getStore?: () => KeyValueStore;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestContext);
  app.use((req, res, next) => {
    const origin = req.get('origin');
    const allowed = deps.server.corsOrigins;
    if (origin && (allowed.includes('*') || allowed.includes(origin))) {
      res.setHeader('Access-Control-Allow-Origin', allowed.includes('*') ? '*' : origin);
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Request-Id');
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    }
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });
  app.use(express.json({ limit: '64kb' }));

  app.use(createHealthRouter(deps.getStore));
  app.use(deps.server.apiPrefix, createApiRouter({ sessions: deps.sessions }));

  app.use((req, _res, next) => {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
  });
  app.use(errorHandler);

  return app;
}
