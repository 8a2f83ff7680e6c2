// ═══════════════════════════════════════════════════════════════════════════════
// ROUTES INDEX — API Route Registration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   app.use(createHealthRouter());
//   app.use('/api/v1', createApiRouter({ sessions }));
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router } from 'express';
import type { SearchSessionService } from '../../services/session/service.js';
import { createSearchRouter } from './search.js';

export { createHealthRouter } from './health.js';
export { createSearchRouter } from './search.js';

export interface ApiRouterOptions {
  readonly sessions: SearchSessionService;
}

export function createApiRouter(options: ApiRouterOptions): Router {
  const router = Router();
  router.use('/search', createSearchRouter(options.sessions));
  return router;
}
