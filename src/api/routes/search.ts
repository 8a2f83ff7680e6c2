// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH ROUTES — Turns, Event Streams, Recovery
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   POST   /search                       Submit a turn (new or follow-up)
//   GET    /search/stream/:sessionId     SSE stream (?lastEventIndex=n)
//   GET    /search/recover/:sessionId    Recovery info (?turnId=n)
//   GET    /search/history/:sessionId    All persisted turns
//   POST   /search/reset/:sessionId      Start the conversation over
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router } from 'express';
import { z } from 'zod';
import { getLogger } from '../../observability/logging/index.js';
import type { SearchSessionService } from '../../services/session/service.js';
import { asyncHandler, ConflictError, NotFoundError, ServiceUnavailableError } from '../middleware/error-handler.js';
import { SseWriter } from '../sse.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMAS
// ─────────────────────────────────────────────────────────────────────────────────

const SessionIdSchema = z.string().trim().min(1).max(128);

const SubmitTurnSchema = z.object({
  query: z.string().trim().min(1).max(500),
  sessionId: SessionIdSchema.optional(),
});

const SessionParamsSchema = z.object({ sessionId: SessionIdSchema });

const StreamQuerySchema = z.object({
  lastEventIndex: z.coerce.number().int().min(0).default(0),
});

const RecoverQuerySchema = z.object({
  turnId: z.coerce.number().int().positive().optional(),
});

const logger = getLogger({ component: 'search-routes' });

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTER FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

export function createSearchRouter(sessions: SearchSessionService): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const body = SubmitTurnSchema.parse(req.body);
      const result = await sessions.submitTurn(body.query, body.sessionId);

      if (!result.ok) {
        if (result.error.code === 'SESSION_BUSY') {
          throw new ConflictError(result.error.message, { sessionId: body.sessionId });
        }
        throw new ServiceUnavailableError(result.error.message);
      }

      res.status(202).json(result.value);
    })
  );

  router.get(
    '/stream/:sessionId',
    asyncHandler(async (req, res) => {
      const { sessionId } = SessionParamsSchema.parse(req.params);
      const { lastEventIndex } = StreamQuerySchema.parse(req.query);

      const controller = new AbortController();
      const subscription = sessions.subscribe(sessionId, lastEventIndex, controller.signal);
      if (!subscription.ok) {
        throw new NotFoundError('Session', sessionId);
      }

      const sse = new SseWriter(res);
      res.on('close', () => controller.abort());
      sse.init();

      for await (const item of subscription.value) {
        if (!sse.send(item)) break;
      }

      logger.debug('Stream closed', { sessionId, aborted: controller.signal.aborted });
      sse.close();
    })
  );

  router.get(
    '/recover/:sessionId',
    asyncHandler(async (req, res) => {
      const { sessionId } = SessionParamsSchema.parse(req.params);
      const { turnId } = RecoverQuerySchema.parse(req.query);
      res.json(await sessions.recover(sessionId, turnId));
    })
  );

  router.get(
    '/history/:sessionId',
    asyncHandler(async (req, res) => {
      const { sessionId } = SessionParamsSchema.parse(req.params);
      const turns = await sessions.history(sessionId);
      res.json({ sessionId, turns });
    })
  );

  router.post(
    '/reset/:sessionId',
    asyncHandler(async (req, res) => {
      const { sessionId } = SessionParamsSchema.parse(req.params);
      await sessions.reset(sessionId);
      res.json({ sessionId, reset: true });
    })
  );

  return router;
}
