// ═══════════════════════════════════════════════════════════════════════════════
// MAIN — Process Entry Point
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig, validateScoringPolicy, validateSearchPolicy } from './config/index.js';
import { configureLogger, getLogger } from './observability/logging/index.js';
import { createApp } from './server.js';
import { createSearchOrchestrator } from './services/food-search/index.js';
import { ConversationCache } from './services/persistence/conversation-cache.js';
import { RequestStatusStore } from './services/persistence/request-status-store.js';
import { TurnResultStore } from './services/persistence/turn-result-store.js';
import { SessionRegistry } from './services/session/registry.js';
import { SearchSessionService } from './services/session/service.js';
import { storeManager } from './storage/index.js';

const logger = getLogger({ component: 'main' });

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogger({
    level: config.logging.debugMode ? 'debug' : 'info',
    redactSecrets: config.logging.redactSecrets,
  });

  for (const check of [validateSearchPolicy(config.search), validateScoringPolicy(config.scoring)]) {
    if (!check.valid) throw new Error(`Invalid policy: ${check.errors.join('; ')}`);
  }

  const store = await storeManager.initialize({
    redisUrl: config.redis.url,
    keyPrefix: config.redis.keyPrefix,
    connectTimeoutMs: config.redis.connectTimeoutMs,
  });

  const sessions = new SearchSessionService({
    orchestrator: createSearchOrchestrator(config),
    turnStore: new TurnResultStore(store, config.persistence.retentionSeconds),
    statusStore: new RequestStatusStore(store, config.persistence.retentionSeconds),
    conversationCache: new ConversationCache(store, config.contextCache),
    registry: new SessionRegistry(config.stream.completedRetentionMs),
    routePrefix: `${config.server.apiPrefix}/search`,
    heartbeatMs: config.stream.heartbeatIntervalMs,
    maxSubscriptionMs: config.stream.maxSubscriptionMs,
  });

  const app = createApp({ sessions, server: config.server });
  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info('Server listening', {
      host: config.server.host,
      port: config.server.port,
      environment: config.env.environment,
      storage: storeManager.isUsingRedis() ? 'redis' : 'memory',
    });
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    server.close(() => {
      storeManager
        .shutdown()
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('Shutdown failed', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(error => {
  logger.fatal('Startup failed', error);
  process.exit(1);
});
