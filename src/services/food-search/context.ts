// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSATION CONTEXT — Per-Session Messages, Results and Exclusions
// ═══════════════════════════════════════════════════════════════════════════════
//
// Two recommendation sets are kept apart:
//   superset  the latest fresh search's result; category/location filters
//             always scope from here, so pivoting category loses nothing
//   working   what the user currently sees; "expand" merges into this one
// Exclusions are applied on every read of either set.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { compareRecommendations, matchesExcluded } from './merge.js';
import { normalizeShopName } from './scoring/engine.js';
import type { RecommendationSet, RestaurantRecommendation, SearchIntent } from './types.js';

export type MessageRole = 'user' | 'assistant';

export interface ConversationMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: string;
}

export interface ContextSeed {
  readonly messages?: readonly ConversationMessage[];
  readonly intent?: SearchIntent;
  readonly superset?: readonly RestaurantRecommendation[];
  readonly working?: readonly RestaurantRecommendation[];
  readonly excluded?: readonly string[];
  readonly turnCount?: number;
  readonly documentIds?: readonly string[];
}

function toMap(recommendations: readonly RestaurantRecommendation[]): Map<string, RestaurantRecommendation> {
  return new Map(recommendations.map(r => [normalizeShopName(r.name), r]));
}

export class ConversationContext {
  private messages: ConversationMessage[] = [];
  private intent: SearchIntent | undefined;
  private superset = new Map<string, RestaurantRecommendation>();
  private working = new Map<string, RestaurantRecommendation>();
  private excluded: string[] = [];
  private completedTurns = 0;
  private documentIds = new Set<string>();

  /**
   * Rebuild a context from persisted turns after the in-memory one was lost.
   */
  static restore(seed: ContextSeed): ConversationContext {
    const context = new ConversationContext();
    context.messages = [...(seed.messages ?? [])];
    context.intent = seed.intent;
    context.superset = toMap(seed.superset ?? []);
    context.working = toMap(seed.working ?? seed.superset ?? []);
    context.excluded = [...(seed.excluded ?? [])];
    context.completedTurns = seed.turnCount ?? 0;
    context.documentIds = new Set(seed.documentIds ?? []);
    return context;
  }

  /**
   * Independent copy for a turn to work on; it replaces the original only
   * once the turn succeeds.
   */
  clone(): ConversationContext {
    const copy = new ConversationContext();
    copy.messages = [...this.messages];
    copy.intent = this.intent;
    copy.superset = new Map(this.superset);
    copy.working = new Map(this.working);
    copy.excluded = [...this.excluded];
    copy.completedTurns = this.completedTurns;
    copy.documentIds = new Set(this.documentIds);
    return copy;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // TURNS & MESSAGES
  // ─────────────────────────────────────────────────────────────────────────────

  get turnCount(): number {
    return this.completedTurns;
  }

  completeTurn(): number {
    return ++this.completedTurns;
  }

  addMessage(role: MessageRole, content: string): ConversationMessage {
    const message = { role, content, timestamp: new Date().toISOString() };
    this.messages.push(message);
    return message;
  }

  recentMessages(count: number): ConversationMessage[] {
    return count > 0 ? this.messages.slice(-count) : [];
  }

  get messageCount(): number {
    return this.messages.length;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SEARCH RESULTS
  // ─────────────────────────────────────────────────────────────────────────────

  get lastIntent(): SearchIntent | undefined {
    return this.intent;
  }

  get excludedShops(): readonly string[] {
    return this.excluded;
  }

  get evidenceDocumentIds(): ReadonlySet<string> {
    return this.documentIds;
  }

  /**
   * A fresh search replaces both sets and the evidence ids. Exclusions stay.
   */
  startSearch(intent: SearchIntent, result: RecommendationSet, documentIds: readonly string[]): void {
    this.intent = intent;
    this.superset = toMap(result.recommendations);
    this.working = toMap(result.recommendations);
    this.documentIds = new Set(documentIds);
  }

  addEvidenceDocuments(documentIds: readonly string[]): void {
    for (const id of documentIds) this.documentIds.add(id);
  }

  supersetList(): RestaurantRecommendation[] {
    return this.visible(this.superset);
  }

  workingSet(): RestaurantRecommendation[] {
    return this.visible(this.working);
  }

  shopNames(): string[] {
    return this.workingSet().map(r => r.name);
  }

  /**
   * Narrow what the user sees. The superset is untouched.
   */
  scopeWorkingSet(recommendations: readonly RestaurantRecommendation[]): void {
    this.working = toMap(recommendations);
  }

  /**
   * Add shops not already in the working set and not excluded. Returns
   * the ones actually added.
   */
  mergeIntoWorking(recommendations: readonly RestaurantRecommendation[]): RestaurantRecommendation[] {
    const added: RestaurantRecommendation[] = [];
    for (const recommendation of recommendations) {
      const key = normalizeShopName(recommendation.name);
      if (this.working.has(key) || this.isExcluded(recommendation.name)) continue;
      this.working.set(key, recommendation);
      added.push(recommendation);
    }
    return added;
  }

  /**
   * Replace a shop wherever it is held (after enrichment, say).
   */
  updateRecommendation(recommendation: RestaurantRecommendation): void {
    const key = normalizeShopName(recommendation.name);
    if (this.working.has(key)) this.working.set(key, recommendation);
    if (this.superset.has(key)) this.superset.set(key, recommendation);
  }

  /**
   * Working set first, then the superset. Exact name wins over substring.
   */
  findShop(target: string): RestaurantRecommendation | undefined {
    const key = normalizeShopName(target);
    if (!key) return undefined;

    const candidates = [...this.workingSet(), ...this.supersetList()];
    return (
      candidates.find(r => normalizeShopName(r.name) === key) ??
      candidates.find(r => {
        const name = normalizeShopName(r.name);
        return name.includes(key) || key.includes(name);
      })
    );
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // EXCLUSIONS
  // ─────────────────────────────────────────────────────────────────────────────

  exclude(name: string): void {
    const key = normalizeShopName(name);
    if (key && !this.excluded.some(entry => normalizeShopName(entry) === key)) {
      this.excluded.push(name.trim());
    }
  }

  isExcluded(name: string): boolean {
    return matchesExcluded(name, this.excluded) !== undefined;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // RESET
  // ─────────────────────────────────────────────────────────────────────────────

  reset(): void {
    this.messages = [];
    this.intent = undefined;
    this.superset.clear();
    this.working.clear();
    this.excluded = [];
    this.completedTurns = 0;
    this.documentIds.clear();
  }

  private visible(map: ReadonlyMap<string, RestaurantRecommendation>): RestaurantRecommendation[] {
    return [...map.values()].filter(r => !this.isExcluded(r.name)).sort(compareRecommendations);
  }
}
