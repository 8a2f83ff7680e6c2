// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH EVENT LOG — Append-Only, Indexed, Replay-Then-Live
// ═══════════════════════════════════════════════════════════════════════════════
//
// One log per session turn. Subscribers first get every logged event from
// the index they ask for (replayed), then live ones, and stop after the
// first terminal event. A subscriber leaving never affects the producer.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import {
  isTerminalEvent,
  type DeliveredEvent,
  type HeartbeatEvent,
  type SearchEvent,
  type SearchEventPayload,
  type StreamItem,
} from './types.js';

export interface SubscribeOptions {
  /** Idle time before a heartbeat */
  readonly heartbeatMs: number;
  /** Give up after this long without a terminal event */
  readonly maxDurationMs: number;
  readonly signal?: AbortSignal;
}

const logger = getLogger({ component: 'event-log' });

export class SearchEventLog {
  private readonly events: SearchEvent[] = [];
  private readonly waiters = new Set<() => void>();

  /**
   * Append and wake blocked subscribers. Ignored once a terminal event is in.
   */
  emit(payload: SearchEventPayload): SearchEvent | undefined {
    if (this.isTerminal) {
      logger.warn('Event after terminal event dropped', { type: payload.type });
      return undefined;
    }

    const event: SearchEvent = { ...payload, index: this.events.length, timestamp: new Date().toISOString() };
    this.events.push(event);

    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const wake of waiters) wake();

    return event;
  }

  get size(): number {
    return this.events.length;
  }

  /** -1 while empty */
  get lastIndex(): number {
    return this.events.length - 1;
  }

  get isTerminal(): boolean {
    const last = this.events[this.events.length - 1];
    return last !== undefined && isTerminalEvent(last);
  }

  all(): readonly SearchEvent[] {
    return this.events;
  }

  /**
   * Events with index ≥ `fromIndex`: replayed ones first, then live ones.
   */
  async *subscribe(fromIndex: number, options: SubscribeOptions): AsyncGenerator<StreamItem> {
    const liveFrom = this.events.length;
    const deadline = Date.now() + options.maxDurationMs;
    let cursor = Math.max(0, Math.floor(fromIndex));

    while (true) {
      for (let event = this.events[cursor]; event !== undefined; event = this.events[cursor]) {
        cursor++;
        const delivered: DeliveredEvent = { ...event, replayed: event.index < liveFrom };
        yield delivered;
        if (isTerminalEvent(event)) return;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0 || options.signal?.aborted) return;

      const woke = await this.waitForEvent(Math.min(options.heartbeatMs, remaining), options.signal);
      if (options.signal?.aborted) return;
      if (!woke && Date.now() < deadline) {
        const heartbeat: HeartbeatEvent = {
          type: 'progress',
          data: { heartbeat: true },
          timestamp: new Date().toISOString(),
          replayed: false,
        };
        yield heartbeat;
      }
    }
  }

  private waitForEvent(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    return new Promise(resolve => {
      const finish = (woke: boolean): void => {
        clearTimeout(timer);
        this.waiters.delete(wake);
        signal?.removeEventListener('abort', onAbort);
        resolve(woke);
      };
      const wake = (): void => finish(true);
      const onAbort = (): void => finish(false);
      const timer = setTimeout(() => finish(false), timeoutMs);

      this.waiters.add(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
