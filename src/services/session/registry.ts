// ═══════════════════════════════════════════════════════════════════════════════
// SESSION REGISTRY — In-Memory Session Records and Their Status Machine
// ═══════════════════════════════════════════════════════════════════════════════
//
//   idle ──beginTurn──▶ loading ──complete──▶ completed
//                          │                     │
//                          └──────fail──────▶ error
//   completed / error ──beginTurn──▶ loading
//
// beginTurn checks and sets the status synchronously, so two submissions for
// one session can never both get through.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import { appError, err, ok, type AppResult } from '../../types/result.js';
import { ConversationContext } from '../food-search/context.js';
import type { TurnOutcome } from '../food-search/types.js';
import { SearchEventLog } from '../streaming/event-log.js';

export type SessionStatus = 'idle' | 'loading' | 'completed' | 'error';

export interface SessionRecord {
  readonly sessionId: string;
  status: SessionStatus;
  context: ConversationContext;
  /** false until durable state has been read back into the context */
  hydrated: boolean;
  log: SearchEventLog;
  turnId: number;
  query: string;
  outcome?: TurnOutcome;
  error?: string;
  updatedAt: number;
}

const logger = getLogger({ component: 'session-registry' });

export class SessionRegistry {
  private readonly records = new Map<string, SessionRecord>();
  private readonly evictions = new Map<string, ReturnType<typeof setTimeout>>();

  /**
   * @param retentionMs finished sessions leave memory after this long; 0 keeps them
   */
  constructor(private readonly retentionMs: number = 0) {}

  get(sessionId: string): SessionRecord | undefined {
    return this.records.get(sessionId);
  }

  get size(): number {
    return this.records.size;
  }

  beginTurn(sessionId: string, query: string): AppResult<SessionRecord, 'SESSION_BUSY'> {
    const existing = this.records.get(sessionId);
    if (existing?.status === 'loading') {
      return err(appError('SESSION_BUSY', 'A turn is already running for this session', { context: { sessionId } }));
    }

    this.cancelEviction(sessionId);

    const record: SessionRecord = existing ?? {
      sessionId,
      status: 'idle',
      context: new ConversationContext(),
      hydrated: false,
      log: new SearchEventLog(),
      turnId: 0,
      query,
      updatedAt: Date.now(),
    };

    record.status = 'loading';
    record.log = new SearchEventLog();
    record.query = query;
    record.outcome = undefined;
    record.error = undefined;
    record.updatedAt = Date.now();
    this.records.set(sessionId, record);

    return ok(record);
  }

  /**
   * A record that was reset meanwhile is left alone.
   */
  complete(record: SessionRecord, outcome: TurnOutcome, turnId: number): void {
    if (!this.isCurrent(record)) return;
    record.status = 'completed';
    record.outcome = outcome;
    record.turnId = turnId;
    record.updatedAt = Date.now();
    this.scheduleEviction(record);
  }

  fail(record: SessionRecord, message: string): void {
    if (!this.isCurrent(record)) return;
    record.status = 'error';
    record.error = message;
    record.updatedAt = Date.now();
    this.scheduleEviction(record);
  }

  remove(sessionId: string): boolean {
    this.cancelEviction(sessionId);
    return this.records.delete(sessionId);
  }

  clear(): void {
    for (const sessionId of [...this.evictions.keys()]) this.cancelEviction(sessionId);
    this.records.clear();
  }

  private isCurrent(record: SessionRecord): boolean {
    return this.records.get(record.sessionId) === record;
  }

  private scheduleEviction(record: SessionRecord): void {
    if (this.retentionMs <= 0) return;
    this.cancelEviction(record.sessionId);

    const timer = setTimeout(() => {
      this.evictions.delete(record.sessionId);
      if (this.isCurrent(record) && record.status !== 'loading') {
        this.records.delete(record.sessionId);
        logger.debug('Session evicted from memory', { sessionId: record.sessionId });
      }
    }, this.retentionMs);
    timer.unref();
    this.evictions.set(record.sessionId, timer);
  }

  private cancelEviction(sessionId: string): void {
    const timer = this.evictions.get(sessionId);
    if (timer) {
      clearTimeout(timer);
      this.evictions.delete(sessionId);
    }
  }
}
