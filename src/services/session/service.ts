// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH SESSION SERVICE — Submit, Subscribe, Recover, Reset
// ═══════════════════════════════════════════════════════════════════════════════
//
// Two tiers: the registry holds volatile working state, the stores hold
// durable turn snapshots. Recovery reads them in that order and never merges
// them. A turn runs as a background task on a copy of the context; a
// subscriber leaving does not stop it. The copy and the durable writes land
// only once the turn has fully succeeded. A reset cancels the running task:
// it writes nothing more, and the session stays busy until it has ended.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import { getLogger, runWithLoggingContext } from '../../observability/logging/index.js';
import { appError, err, ok, toError, type AppResult, type AsyncAppResult } from '../../types/result.js';
import { ConversationContext } from '../food-search/context.js';
import type { SearchOrchestrator } from '../food-search/orchestrator.js';
import type { RestaurantRecommendation, TurnOutcome } from '../food-search/types.js';
import type { ConversationCache } from '../persistence/conversation-cache.js';
import type { RequestStatusStore } from '../persistence/request-status-store.js';
import type { TurnResult, TurnResultStore } from '../persistence/turn-result-store.js';
import { initialSteps, StepTracker } from '../streaming/step-tracker.js';
import type { StepState, StreamItem } from '../streaming/types.js';
import { SessionRegistry, type SessionRecord } from './registry.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type SessionErrorCode = 'SESSION_BUSY' | 'SESSION_NOT_FOUND' | 'STORE_UNAVAILABLE';

export interface SearchSessionServiceDeps {
  readonly orchestrator: SearchOrchestrator;
  readonly turnStore: TurnResultStore;
  readonly statusStore: RequestStatusStore;
  readonly conversationCache: ConversationCache;
  readonly registry?: SessionRegistry;
  /** Prefix the search routes are mounted under, for subscribe URLs */
  readonly routePrefix: string;
  readonly heartbeatMs: number;
  readonly maxSubscriptionMs: number;
}

export interface SubmitTurnResponse {
  readonly sessionId: string;
  readonly turnId: number;
  readonly subscribeUrl: string;
  readonly loadingSteps: readonly StepState[];
}

export interface RecoveredResult {
  readonly summary: string;
  readonly status: TurnOutcome['status'];
  readonly restaurants: readonly RestaurantRecommendation[];
  readonly filteredCount: number;
}

export type RecoveryInfo =
  | {
      readonly status: 'loading';
      readonly sessionId: string;
      readonly turnId: number;
      readonly subscribeUrl: string;
      /** Index of the last event logged so far, -1 when none */
      readonly lastEventIndex: number;
    }
  | {
      readonly status: 'completed';
      readonly sessionId: string;
      readonly turnId: number;
      readonly source: 'memory' | 'store';
      readonly result: RecoveredResult;
    }
  | { readonly status: 'error'; readonly sessionId: string; readonly error: string }
  | { readonly status: 'interrupted'; readonly sessionId: string; readonly query: string }
  | { readonly status: 'not_found'; readonly sessionId: string };

const logger = getLogger({ component: 'search-session' });

// ─────────────────────────────────────────────────────────────────────────────────
// SERVICE
// ─────────────────────────────────────────────────────────────────────────────────

export class SearchSessionService {
  private readonly registry: SessionRegistry;
  private readonly tasks = new Map<string, Promise<void>>();
  /** Tasks still in flight, including ones a reset has cancelled */
  private readonly running = new Map<string, AbortController>();

  constructor(private readonly deps: SearchSessionServiceDeps) {
    this.registry = deps.registry ?? new SessionRegistry();
  }

  subscribeUrl(sessionId: string, lastEventIndex = 0): string {
    return `${this.deps.routePrefix}/stream/${encodeURIComponent(sessionId)}?lastEventIndex=${lastEventIndex}`;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SUBMIT
  // ─────────────────────────────────────────────────────────────────────────────

  async submitTurn(text: string, sessionId: string = uuidv4()): AsyncAppResult<SubmitTurnResponse, SessionErrorCode> {
    if (this.running.has(sessionId)) {
      return err(appError('SESSION_BUSY', 'A turn is still running for this session', { context: { sessionId } }));
    }

    const begun = this.registry.beginTurn(sessionId, text);
    if (!begun.ok) return begun;
    const record = begun.value;
    const controller = new AbortController();
    this.running.set(sessionId, controller);

    let turnId: number;
    try {
      if (!record.hydrated) {
        record.context = await this.restoreContext(sessionId);
        record.hydrated = true;
      }
      turnId = (await this.deps.turnStore.latestTurnId(sessionId)) + 1;
      record.turnId = turnId;
      await this.deps.statusStore.createRequest(sessionId, text, record.context.lastIntent?.location);
    } catch (error) {
      logger.error('Could not start turn', error, { sessionId });
      this.running.delete(sessionId);
      this.registry.fail(record, 'store unavailable');
      return err(appError('STORE_UNAVAILABLE', 'Session state could not be read or written', { cause: error }));
    }

    const task = runWithLoggingContext({ sessionId, turnId }, () =>
      this.runTurnTask(record, text, controller.signal)
    ).finally(() => {
      if (this.running.get(sessionId) === controller) this.running.delete(sessionId);
    });
    this.tasks.set(sessionId, task);
    logger.info('Turn accepted', { sessionId, turnId });

    return ok({
      sessionId,
      turnId,
      subscribeUrl: this.subscribeUrl(sessionId),
      loadingSteps: initialSteps(),
    });
  }

  /**
   * Resolves when the session's latest background turn has finished.
   */
  async settled(sessionId: string): Promise<void> {
    await this.tasks.get(sessionId);
  }

  private async runTurnTask(record: SessionRecord, text: string, signal: AbortSignal): Promise<void> {
    const { sessionId, log } = record;
    const tracker = new StepTracker(log);
    const draft = record.context.clone();

    const cancelled = (): boolean => {
      if (signal.aborted) logger.info('Turn discarded after reset', { sessionId, turnId: record.turnId });
      return signal.aborted;
    };

    try {
      const outcome = await this.deps.orchestrator.runTurn(text, draft, tracker);

      if (cancelled()) return;
      const saved = await this.deps.turnStore.saveTurnResult(sessionId, {
        kind: outcome.action === 'new_search' ? 'search' : 'follow_up',
        query: text,
        action: outcome.action,
        status: outcome.status,
        summary: outcome.summary,
        restaurants: outcome.recommendations,
        filteredCount: outcome.filteredCount,
        intent: outcome.intent,
        excluded: draft.excludedShops,
        documentIds: [...draft.evidenceDocumentIds],
        superset: draft.supersetList(),
        working: draft.workingSet(),
      });
      if (cancelled()) return;
      await this.deps.conversationCache.append(sessionId, 'user', text);
      await this.deps.conversationCache.append(sessionId, 'assistant', outcome.summary);
      if (cancelled()) return;
      await this.deps.statusStore.updateStatus(sessionId, 'completed', {
        resultsCount: outcome.recommendations.length,
        location: outcome.intent?.location,
      });
      if (cancelled()) return;

      record.context = draft;
      this.registry.complete(record, outcome, saved.turnId);

      log.emit({
        type: 'result',
        data: {
          summary: outcome.summary,
          total: outcome.recommendations.length,
          filtered: outcome.filteredCount,
          status: outcome.status,
          action: outcome.action,
          questions: outcome.questions,
        },
      });
      log.emit({ type: 'done', data: { turnId: saved.turnId } });
    } catch (error) {
      const message = toError(error).message;
      logger.error('Turn failed', error, { sessionId, turnId: record.turnId });

      const step = tracker.current();
      if (step) tracker.stepError(step, message);
      log.emit({ type: 'error', data: { code: 'TURN_FAILED', message } });
      this.registry.fail(record, message);
      if (cancelled()) return;

      try {
        await this.deps.statusStore.updateStatus(sessionId, 'error', { error: message });
      } catch (storeError) {
        logger.error('Could not record turn failure', storeError, { sessionId });
      }
    }
  }

  /**
   * Rebuild a conversation from durable state: turns since the last reset
   * and the cached message window.
   */
  async restoreContext(sessionId: string): Promise<ConversationContext> {
    const turns = await this.deps.turnStore.listTurnsSinceReset(sessionId);
    const messages = await this.deps.conversationCache.recent(sessionId);

    const latest = turns[turns.length - 1];
    if (!latest) {
      return ConversationContext.restore({ messages });
    }

    const search = [...turns].reverse().find(turn => turn.kind === 'search' && turn.intent !== undefined);

    return ConversationContext.restore({
      messages,
      intent: latest.intent ?? search?.intent,
      superset: latest.superset,
      working: latest.working,
      excluded: latest.excluded,
      turnCount: turns.length,
      documentIds: latest.documentIds,
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SUBSCRIBE
  // ─────────────────────────────────────────────────────────────────────────────

  subscribe(
    sessionId: string,
    lastEventIndex: number,
    signal?: AbortSignal
  ): AppResult<AsyncGenerator<StreamItem>, 'SESSION_NOT_FOUND'> {
    const record = this.registry.get(sessionId);
    if (!record) {
      return err(appError('SESSION_NOT_FOUND', 'No live session; use recovery', { context: { sessionId } }));
    }

    return ok(
      record.log.subscribe(lastEventIndex, {
        heartbeatMs: this.deps.heartbeatMs,
        maxDurationMs: this.deps.maxSubscriptionMs,
        signal,
      })
    );
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // RECOVER
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * In-memory record first, then the turn store, then the request status.
   * With a turn id, only that stored turn is looked up.
   */
  async recover(sessionId: string, turnId?: number): Promise<RecoveryInfo> {
    if (turnId !== undefined) {
      const turn = await this.deps.turnStore.getTurnResult(sessionId, turnId);
      return turn ? fromTurn(turn) : { status: 'not_found', sessionId };
    }

    const record = this.registry.get(sessionId);
    if (record) {
      switch (record.status) {
        case 'loading':
          return {
            status: 'loading',
            sessionId,
            turnId: record.turnId,
            subscribeUrl: this.subscribeUrl(sessionId, Math.max(0, record.log.lastIndex + 1)),
            lastEventIndex: record.log.lastIndex,
          };
        case 'completed':
          if (record.outcome) {
            return {
              status: 'completed',
              sessionId,
              turnId: record.turnId,
              source: 'memory',
              result: {
                summary: record.outcome.summary,
                status: record.outcome.status,
                restaurants: restaurantsFromLog(record),
                filteredCount: record.outcome.filteredCount,
              },
            };
          }
          break;
        case 'error':
          return { status: 'error', sessionId, error: record.error ?? 'unknown error' };
        case 'idle':
          break;
      }
    }

    const latest = await this.deps.turnStore.getLatestTurnResult(sessionId);
    if (latest) return fromTurn(latest);

    const request = await this.deps.statusStore.getRequest(sessionId);
    if (request?.status === 'loading') {
      return { status: 'interrupted', sessionId, query: request.query };
    }
    if (request?.status === 'error') {
      return { status: 'error', sessionId, error: request.error ?? 'unknown error' };
    }

    return { status: 'not_found', sessionId };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // RESET & HISTORY
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Start over: a running turn is cancelled, the in-memory context, the
   * message window and the request status go, and later restores ignore
   * every turn saved so far. History keeps them.
   */
  async reset(sessionId: string): Promise<void> {
    const running = this.running.get(sessionId);
    if (running) {
      running.abort();
      logger.info('Running turn cancelled', { sessionId });
    }

    const record = this.registry.get(sessionId);
    record?.context.reset();
    this.registry.remove(sessionId);

    await this.deps.conversationCache.clear(sessionId);
    await this.deps.statusStore.deleteRequest(sessionId);
    await this.deps.turnStore.markReset(sessionId);
    logger.info('Session reset', { sessionId });
  }

  async history(sessionId: string): Promise<TurnResult[]> {
    return this.deps.turnStore.listTurnResults(sessionId);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function fromTurn(turn: TurnResult): RecoveryInfo {
  return {
    status: 'completed',
    sessionId: turn.sessionId,
    turnId: turn.turnId,
    source: 'store',
    result: {
      summary: turn.summary,
      status: turn.status,
      restaurants: turn.restaurants,
      filteredCount: turn.filteredCount,
    },
  };
}

function restaurantsFromLog(record: SessionRecord): RestaurantRecommendation[] {
  const restaurants: RestaurantRecommendation[] = [];
  for (const event of record.log.all()) {
    if (event.type === 'restaurant') restaurants.push(event.data.restaurant);
  }
  return restaurants;
}
