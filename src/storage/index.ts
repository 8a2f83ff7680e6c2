// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE — Store Manager and Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════
//
// Redis when configured and reachable, otherwise the in-memory store. The
// fallback keeps development usable; recovery across restarts needs Redis.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../observability/logging/index.js';
import { MemoryStore } from './memory.js';
import { RedisStore } from './redis.js';
import type { KeyValueStore } from './types.js';

export type { KeyValueStore } from './types.js';
export { MemoryStore } from './memory.js';
export { RedisStore, type RedisStoreOptions } from './redis.js';

const logger = getLogger({ component: 'storage' });

export interface StoreManagerOptions {
  readonly redisUrl?: string;
  readonly keyPrefix?: string;
  readonly connectTimeoutMs?: number;
}

export class StoreManager {
  private store: KeyValueStore = new MemoryStore();
  private redis: RedisStore | null = null;

  async initialize(options: StoreManagerOptions = {}): Promise<KeyValueStore> {
    if (!options.redisUrl) {
      logger.info('No Redis configured, using in-memory store');
      return this.store;
    }

    const redis = new RedisStore({
      url: options.redisUrl,
      keyPrefix: options.keyPrefix,
      connectTimeoutMs: options.connectTimeoutMs,
    });

    try {
      await redis.connect();
      await redis.ping();
      this.redis = redis;
      this.store = redis;
      logger.info('Redis connected', { url: options.redisUrl });
    } catch (error) {
      redis.close();
      logger.warn('Redis connection failed, using in-memory store', {
        url: options.redisUrl,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return this.store;
  }

  getStore(): KeyValueStore {
    return this.store;
  }

  isUsingRedis(): boolean {
    return this.redis !== null;
  }

  async shutdown(): Promise<void> {
    if (this.redis) {
      await this.redis.disconnect();
      this.redis = null;
      this.store = new MemoryStore();
    }
  }
}

export const storeManager = new StoreManager();

export function getStore(): KeyValueStore {
  return storeManager.getStore();
}
