// ═══════════════════════════════════════════════════════════════════════════════
// TURN RESULT STORE — Durable, Turn-Indexed Results per Session
// ═══════════════════════════════════════════════════════════════════════════════
//
// Turn ids come from a per-session counter (INCR), so they start at 1 and
// never repeat. Records are written only after a turn fully succeeded.
//
// Keys:
//   turns:{sessionId}:seq        latest assigned turn id
//   turns:{sessionId}:base       last turn id before the latest reset
//   turns:{sessionId}:{turnId}   the turn record (JSON)
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { getLogger } from '../../observability/logging/index.js';
import type { KeyValueStore } from '../../storage/index.js';
import type { FollowUpType, RestaurantRecommendation, SearchIntent, TurnStatus } from '../food-search/types.js';
import { parseStored, RestaurantRecommendationSchema, SearchIntentSchema } from './schemas.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type TurnKind = 'search' | 'follow_up';

export interface TurnResultInput {
  readonly kind: TurnKind;
  readonly query: string;
  readonly action: FollowUpType;
  readonly status: TurnStatus;
  readonly summary: string;
  readonly restaurants: readonly RestaurantRecommendation[];
  readonly filteredCount: number;
  readonly intent?: SearchIntent;
  /** Session exclusions after the turn */
  readonly excluded: readonly string[];
  /** Evidence documents held after the turn */
  readonly documentIds: readonly string[];
  /** Latest fresh search's result as held after the turn */
  readonly superset: readonly RestaurantRecommendation[];
  /** What the user was working from after the turn; `restaurants` is only what the turn showed */
  readonly working: readonly RestaurantRecommendation[];
}

export interface TurnResult extends TurnResultInput {
  readonly sessionId: string;
  readonly turnId: number;
  readonly createdAt: string;
}

const TurnResultSchema = z.object({
  sessionId: z.string(),
  turnId: z.number().int().positive(),
  kind: z.enum(['search', 'follow_up']),
  query: z.string(),
  action: z.enum([
    'new_search',
    'exclude_filter',
    'category_filter',
    'location_filter',
    'expand',
    'detail',
    'confirm',
    'interpreted',
  ]),
  status: z.enum(['ok', 'clarify', 'no_results']),
  summary: z.string(),
  restaurants: z.array(RestaurantRecommendationSchema),
  filteredCount: z.number(),
  intent: SearchIntentSchema.optional(),
  excluded: z.array(z.string()),
  documentIds: z.array(z.string()),
  superset: z.array(RestaurantRecommendationSchema),
  working: z.array(RestaurantRecommendationSchema),
  createdAt: z.string(),
});

const logger = getLogger({ component: 'turn-result-store' });

// ─────────────────────────────────────────────────────────────────────────────────
// STORE
// ─────────────────────────────────────────────────────────────────────────────────

export class TurnResultStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly retentionSeconds: number
  ) {}

  private seqKey(sessionId: string): string {
    return `turns:${sessionId}:seq`;
  }

  private baseKey(sessionId: string): string {
    return `turns:${sessionId}:base`;
  }

  private turnKey(sessionId: string, turnId: number): string {
    return `turns:${sessionId}:${turnId}`;
  }

  async saveTurnResult(sessionId: string, input: TurnResultInput): Promise<TurnResult> {
    const turnId = await this.store.incr(this.seqKey(sessionId));
    await this.store.expire(this.seqKey(sessionId), this.retentionSeconds);

    const record: TurnResult = { ...input, sessionId, turnId, createdAt: new Date().toISOString() };
    await this.store.set(this.turnKey(sessionId, turnId), JSON.stringify(record), this.retentionSeconds);

    logger.debug('Turn saved', { sessionId, turnId, restaurants: input.restaurants.length });
    return record;
  }

  async getTurnResult(sessionId: string, turnId: number): Promise<TurnResult | null> {
    return parseStored(TurnResultSchema, await this.store.get(this.turnKey(sessionId, turnId)));
  }

  /** 0 when the session has no saved turns */
  async latestTurnId(sessionId: string): Promise<number> {
    const raw = await this.store.get(this.seqKey(sessionId));
    const value = raw === null ? 0 : parseInt(raw, 10);
    return Number.isFinite(value) ? value : 0;
  }

  async getLatestTurnResult(sessionId: string): Promise<TurnResult | null> {
    const latest = await this.latestTurnId(sessionId);
    return latest > 0 ? this.getTurnResult(sessionId, latest) : null;
  }

  /**
   * Ascending turn id. Expired or unreadable turns are skipped.
   */
  async listTurnResults(sessionId: string): Promise<TurnResult[]> {
    const latest = await this.latestTurnId(sessionId);
    const results: TurnResult[] = [];
    for (let turnId = 1; turnId <= latest; turnId++) {
      const result = await this.getTurnResult(sessionId, turnId);
      if (result) results.push(result);
    }
    return results;
  }

  /**
   * Mark everything saved so far as belonging to an earlier conversation.
   * History keeps it; `listTurnsSinceReset` no longer does.
   */
  async markReset(sessionId: string): Promise<number> {
    const latest = await this.latestTurnId(sessionId);
    await this.store.set(this.baseKey(sessionId), String(latest), this.retentionSeconds);
    return latest;
  }

  async resetBaseline(sessionId: string): Promise<number> {
    const raw = await this.store.get(this.baseKey(sessionId));
    const value = raw === null ? 0 : parseInt(raw, 10);
    return Number.isFinite(value) ? value : 0;
  }

  async listTurnsSinceReset(sessionId: string): Promise<TurnResult[]> {
    const baseline = await this.resetBaseline(sessionId);
    return (await this.listTurnResults(sessionId)).filter(turn => turn.turnId > baseline);
  }
}
