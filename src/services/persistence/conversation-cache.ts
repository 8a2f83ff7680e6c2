// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSATION CACHE — Short-TTL Message Window per Session
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import type { KeyValueStore } from '../../storage/index.js';
import type { ConversationMessage, MessageRole } from '../food-search/context.js';
import { parseStored } from './schemas.js';

export interface ConversationCacheOptions {
  readonly ttlSeconds: number;
  /** Messages kept per session; older ones are trimmed */
  readonly windowSize: number;
}

const MessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string(),
});

export class ConversationCache {
  constructor(
    private readonly store: KeyValueStore,
    private readonly options: ConversationCacheOptions
  ) {}

  private key(sessionId: string): string {
    return `conversation:${sessionId}`;
  }

  async append(sessionId: string, role: MessageRole, content: string, timestamp = new Date().toISOString()): Promise<void> {
    const key = this.key(sessionId);
    const message: ConversationMessage = { role, content, timestamp };
    await this.store.rpush(key, JSON.stringify(message));
    await this.store.ltrim(key, -this.options.windowSize, -1);
    await this.store.expire(key, this.options.ttlSeconds);
  }

  /**
   * Oldest first. Defaults to the whole window.
   */
  async recent(sessionId: string, count: number = this.options.windowSize): Promise<ConversationMessage[]> {
    if (count <= 0) return [];
    const raw = await this.store.lrange(this.key(sessionId), -count, -1);
    return raw.flatMap(entry => {
      const message = parseStored(MessageSchema, entry);
      return message ? [message] : [];
    });
  }

  async length(sessionId: string): Promise<number> {
    return this.store.llen(this.key(sessionId));
  }

  async clear(sessionId: string): Promise<void> {
    await this.store.delete(this.key(sessionId));
  }
}
