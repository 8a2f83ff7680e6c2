// ═══════════════════════════════════════════════════════════════════════════════
// FOLLOW-UP HANDLERS — One Handler per Action, Operating on Held Results
// ═══════════════════════════════════════════════════════════════════════════════
//
// Only "expand" goes back to the document source. Everything else works on
// what the conversation already holds.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { keywordsFor } from './categories.js';
import type { ConversationContext } from './context.js';
import { compareRecommendations, matchesExcluded } from './merge.js';
import { normalizeShopName } from './scoring/engine.js';
import type {
  FollowUpAction,
  RecommendationSet,
  RestaurantRecommendation,
  SearchIntent,
  ShopVerdict,
  TurnOutcome,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type FollowUpOnlyAction = Exclude<FollowUpAction, { readonly type: 'new_search' }>;

type ActionMap = { [A in FollowUpOnlyAction as A['type']]: A };
export type FollowUpActionType = keyof ActionMap;

export interface ExpansionResult {
  readonly set: RecommendationSet;
  readonly documentIds: readonly string[];
}

export interface FollowUpEnvironment {
  readonly context: ConversationContext;
  /** Narrower second search pass; never returns documents in `excludeIds` */
  readonly searchExpansion: (intent: SearchIntent, excludeIds: ReadonlySet<string>) => Promise<ExpansionResult>;
}

type Handler<A> = (action: A, env: FollowUpEnvironment) => Promise<TurnOutcome>;

export type FollowUpHandlerTable = { readonly [K in FollowUpActionType]: Handler<ActionMap[K]> };

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Weight of a verdict when choosing a single shop for the user.
 */
export const VERDICT_WEIGHTS: Readonly<Record<ShopVerdict, number>> = {
  genuine: 5,
  likely_genuine: 4,
  unknown: 2,
  likely_promoted: 1,
  promoted: 0,
};

function outcome(
  action: FollowUpActionType,
  summary: string,
  recommendations: readonly RestaurantRecommendation[],
  extra: Partial<TurnOutcome> = {}
): TurnOutcome {
  return {
    status: 'ok',
    action,
    summary,
    recommendations,
    filtered: [],
    filteredCount: 0,
    ...extra,
  };
}

function searchableText(recommendation: RestaurantRecommendation): string {
  const enrichment = recommendation.enrichment;
  return [
    recommendation.name,
    recommendation.location ?? '',
    ...recommendation.features,
    enrichment?.address ?? '',
    enrichment?.businessArea ?? '',
    ...(enrichment?.tags ?? []),
  ]
    .join('\n')
    .toLowerCase();
}

function places(count: number): string {
  return `${count} place${count === 1 ? '' : 's'}`;
}

function listNames(recommendations: readonly RestaurantRecommendation[], limit = 3): string {
  return recommendations
    .slice(0, limit)
    .map(r => r.name)
    .join(', ');
}

/**
 * Rank the superset by how many of the keywords each shop's text hits.
 * Shops with no hit are left out.
 */
function scopeByKeywords(
  candidates: readonly RestaurantRecommendation[],
  keywords: readonly string[]
): RestaurantRecommendation[] {
  return candidates
    .map(recommendation => {
      const text = searchableText(recommendation);
      return { recommendation, hits: keywords.filter(keyword => text.includes(keyword)).length };
    })
    .filter(entry => entry.hits > 0)
    .sort((a, b) => b.hits - a.hits || compareRecommendations(a.recommendation, b.recommendation))
    .map(entry => entry.recommendation);
}

// ─────────────────────────────────────────────────────────────────────────────────
// HANDLERS
// ─────────────────────────────────────────────────────────────────────────────────

const handleExclude: Handler<ActionMap['exclude_filter']> = async (action, { context }) => {
  const before = context.workingSet();
  context.exclude(action.target);
  const after = context.workingSet();

  const removed = before
    .filter(r => matchesExcluded(r.name, [action.target]) !== undefined)
    .map(r => ({ ...r, isRecommended: false, filterReason: `excluded by request: ${action.target}` }));

  const summary =
    removed.length > 0
      ? `Removed ${listNames(removed, removed.length)}. ${after.length} left.`
      : `Nothing called "${action.target}" in the current list; it will stay out of later results.`;

  return outcome('exclude_filter', summary, after, {
    filtered: removed,
    filteredCount: before.length - after.length,
  });
};

const handleCategory: Handler<ActionMap['category_filter']> = async (action, { context }) => {
  const scoped = scopeByKeywords(context.supersetList(), keywordsFor(action.target));

  if (scoped.length === 0) {
    return outcome(
      'category_filter',
      `None of the current places look like ${action.target}; keeping the full list.`,
      context.workingSet()
    );
  }

  context.scopeWorkingSet(scoped);
  return outcome('category_filter', `${places(scoped.length)} for ${action.target}: ${listNames(scoped)}.`, scoped);
};

const handleLocation: Handler<ActionMap['location_filter']> = async (action, { context }) => {
  const scoped = scopeByKeywords(context.supersetList(), [action.target.toLowerCase()]);

  if (scoped.length === 0) {
    return outcome(
      'location_filter',
      `None of the current places are near ${action.target}; keeping the full list.`,
      context.workingSet()
    );
  }

  context.scopeWorkingSet(scoped);
  return outcome('location_filter', `${places(scoped.length)} near ${action.target}: ${listNames(scoped)}.`, scoped);
};

const handleExpand: Handler<ActionMap['expand']> = async (_action, { context, searchExpansion }) => {
  const intent = context.lastIntent;
  if (!intent) {
    return outcome('expand', 'There is no earlier search to expand. Where should I look?', [], { status: 'clarify' });
  }

  const expansion = await searchExpansion(intent, context.evidenceDocumentIds);
  context.addEvidenceDocuments(expansion.documentIds);
  const added = context.mergeIntoWorking(expansion.set.recommendations);
  const working = context.workingSet();

  const summary =
    added.length > 0
      ? `Found ${added.length} more: ${listNames(added, added.length)}.`
      : 'No new places turned up; here is the current list.';

  return outcome('expand', summary, working, {
    filtered: expansion.set.filtered,
    filteredCount: expansion.set.filtered.length,
  });
};

function describeShop(shop: RestaurantRecommendation): string {
  const parts = [`${shop.name}: ${shop.classification.verdict.replace('_', ' ')} (${Math.round(shop.confidence * 100)}%)`];
  if (shop.enrichment?.address ?? shop.location) parts.push(`at ${shop.enrichment?.address ?? shop.location}`);
  const reasons = [...shop.classification.reasons, ...shop.features].slice(0, 3);
  if (reasons.length > 0) parts.push(reasons.join('; '));
  const corroboration = new Set(shop.sourceDocumentIds).size;
  parts.push(`mentioned in ${corroboration} post${corroboration === 1 ? '' : 's'}`);
  return `${parts.join(', ')}.`;
}

const handleDetail: Handler<ActionMap['detail']> = async (action, { context }) => {
  const shop = context.findShop(action.target);
  if (!shop) {
    return outcome('detail', `I couldn't find "${action.target}" in these results.`, [], { status: 'no_results' });
  }
  return outcome('detail', describeShop(shop), [shop]);
};

/**
 * Highest verdict weight × confidence; list order breaks ties.
 */
export function pickBest(recommendations: readonly RestaurantRecommendation[]): RestaurantRecommendation | undefined {
  let best: RestaurantRecommendation | undefined;
  let bestScore = -1;
  for (const recommendation of recommendations) {
    const value = VERDICT_WEIGHTS[recommendation.classification.verdict] * recommendation.confidence;
    if (value > bestScore) {
      best = recommendation;
      bestScore = value;
    }
  }
  return best;
}

const handleConfirm: Handler<ActionMap['confirm']> = async (_action, { context }) => {
  const best = pickBest(context.workingSet());
  if (!best) {
    return outcome('confirm', 'There is nothing to choose from yet.', [], { status: 'no_results' });
  }
  return outcome('confirm', `Go with ${best.name}. ${describeShop(best)}`, [best]);
};

const handleInterpreted: Handler<ActionMap['interpreted']> = async (action, { context }) => {
  const working = context.workingSet();
  if (action.degraded) {
    return outcome('interpreted', action.response, working);
  }

  const seen = new Set<string>();
  const matched: RestaurantRecommendation[] = [];
  for (const name of action.shops) {
    const shop = context.findShop(name);
    if (shop && !seen.has(normalizeShopName(shop.name))) {
      seen.add(normalizeShopName(shop.name));
      matched.push(shop);
    }
  }

  return outcome('interpreted', action.response || 'Here is the current list.', matched.length > 0 ? matched : working);
};

// ─────────────────────────────────────────────────────────────────────────────────
// DISPATCH
// ─────────────────────────────────────────────────────────────────────────────────

export const FOLLOW_UP_HANDLERS: FollowUpHandlerTable = {
  exclude_filter: handleExclude,
  category_filter: handleCategory,
  location_filter: handleLocation,
  expand: handleExpand,
  detail: handleDetail,
  confirm: handleConfirm,
  interpreted: handleInterpreted,
};

function runHandler<K extends FollowUpActionType>(
  type: K,
  action: ActionMap[K],
  env: FollowUpEnvironment,
  table: FollowUpHandlerTable
): Promise<TurnOutcome> {
  const handler: Handler<ActionMap[K]> = table[type];
  return handler(action, env);
}

export function handleFollowUp(
  action: FollowUpOnlyAction,
  env: FollowUpEnvironment,
  table: FollowUpHandlerTable = FOLLOW_UP_HANDLERS
): Promise<TurnOutcome> {
  return runHandler(action.type, action, env, table);
}
