// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTES — /health and /ready endpoints
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { canEnrichPOI, canUseLLM, loadConfig } from '../../config/index.js';
import { getLogger } from '../../observability/logging/index.js';
import { storeManager, type KeyValueStore } from '../../storage/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ComponentHealth {
  status: 'up' | 'degraded' | 'down';
  latency?: number;
  message?: string;
}

export interface HealthCheck {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  storage: ComponentHealth & { type: 'redis' | 'memory' };
  collaborators: {
    llm: boolean;
    documentSource: boolean;
    poi: boolean;
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// CHECKS
// ─────────────────────────────────────────────────────────────────────────────────

export async function checkStorage(store: KeyValueStore): Promise<ComponentHealth> {
  const start = Date.now();

  try {
    const reply = await store.ping();
    const latency = Date.now() - start;

    if (reply !== 'PONG') {
      return { status: 'degraded', latency, message: `Unexpected ping reply: ${reply}` };
    }
    if (latency > 1000) {
      return { status: 'degraded', latency, message: 'High latency' };
    }
    return { status: 'up', latency };
  } catch (error) {
    return {
      status: 'down',
      message: error instanceof Error ? error.message : 'Storage check failed',
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTES
// ─────────────────────────────────────────────────────────────────────────────────

export function createHealthRouter(getStore: () => KeyValueStore = () => storeManager.getStore()): Router {
  const router = Router();
  const logger = getLogger({ component: 'health' });

  // ─── HEALTH CHECK (liveness) ───
  router.get('/health', async (_req: Request, res: Response) => {
    const config = loadConfig();
    const storage = await checkStorage(getStore());

    const health: HealthCheck = {
      status: storage.status === 'down' ? 'unhealthy' : storage.status === 'up' ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.env.environment,
      storage: { ...storage, type: storeManager.isUsingRedis() ? 'redis' : 'memory' },
      collaborators: {
        llm: canUseLLM(),
        documentSource: config.sources.documentSourceUrl !== undefined,
        poi: canEnrichPOI(),
      },
    };

    if (health.status !== 'healthy') {
      logger.warn('Health check degraded', { status: health.status, storage: storage.status });
    }

    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  });

  // ─── READINESS CHECK ───
  router.get('/ready', async (_req: Request, res: Response) => {
    const storage = await checkStorage(getStore());
    const ready = storage.status !== 'down';

    if (!ready) {
      logger.error('Readiness check failed', undefined, { message: storage.message });
    }

    res.status(ready ? 200 : 503).json({ ready, timestamp: new Date().toISOString() });
  });

  return router;
}
