// ═══════════════════════════════════════════════════════════════════════════════
// MERGE & CROSS-VALIDATION — Per-Document Recommendations → Ranked Set
// ═══════════════════════════════════════════════════════════════════════════════

import { DEFAULT_SCORING_POLICY, type ScoringPolicy } from '../../config/search.js';
import { cleanShopName, normalizeShopName } from './scoring/engine.js';
import type { RecommendationSet, RestaurantRecommendation, ShopVerdict } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// EXCLUSION MATCHING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * A name matches an exclusion entry when either contains the other after
 * normalization. The user types "Old Noodle", the shop is "Old Noodle House".
 */
export function matchesExcluded(name: string, excluded: readonly string[]): string | undefined {
  const key = normalizeShopName(name);
  if (!key) return undefined;

  return excluded.find(entry => {
    const target = normalizeShopName(entry);
    return target.length > 0 && (key.includes(target) || target.includes(key));
  });
}

export function isPromoted(verdict: ShopVerdict): boolean {
  return verdict === 'promoted' || verdict === 'likely_promoted';
}

// ─────────────────────────────────────────────────────────────────────────────────
// MERGE
// ─────────────────────────────────────────────────────────────────────────────────

const PLACEHOLDER_NAMES = new Set(['unknown', 'n/a', '未知']);

function union<T>(first: readonly T[], second: readonly T[]): T[] {
  return [...new Set([...first, ...second])];
}

function combine(existing: RestaurantRecommendation, incoming: RestaurantRecommendation): RestaurantRecommendation {
  const stronger = incoming.confidence > existing.confidence ? incoming : existing;

  return {
    ...existing,
    location: existing.location ?? incoming.location,
    features: union(existing.features, incoming.features),
    sourceDocumentIds: union(existing.sourceDocumentIds, incoming.sourceDocumentIds),
    confidence: stronger.confidence,
    classification: stronger.classification,
    enrichment: existing.enrichment ?? incoming.enrichment,
  };
}

/**
 * Group by normalized name. Placeholder and blank names are dropped.
 */
export function mergeByName(recommendations: readonly RestaurantRecommendation[]): RestaurantRecommendation[] {
  const merged = new Map<string, RestaurantRecommendation>();

  for (const recommendation of recommendations) {
    const name = cleanShopName(recommendation.name);
    const key = normalizeShopName(name);
    if (!key || PLACEHOLDER_NAMES.has(key)) continue;

    const existing = merged.get(key);
    merged.set(key, existing ? combine(existing, recommendation) : { ...recommendation, name });
  }

  return [...merged.values()];
}

// ─────────────────────────────────────────────────────────────────────────────────
// CROSS-VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Decide recommended/filtered and apply the corroboration adjustments.
 */
export function crossValidate(
  recommendation: RestaurantRecommendation,
  excluded: readonly string[],
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): RestaurantRecommendation {
  const base = { ...recommendation, isRecommended: true, filterReason: undefined };

  const exclusion = matchesExcluded(recommendation.name, excluded);
  if (exclusion !== undefined) {
    return { ...base, isRecommended: false, filterReason: `excluded by request: ${exclusion}` };
  }

  const { classification } = recommendation;
  if (isPromoted(classification.verdict)) {
    const reasons = classification.reasons.slice(0, 2).join(', ');
    return {
      ...base,
      isRecommended: false,
      filterReason: reasons ? `judged promoted: ${reasons}` : 'judged promoted',
    };
  }

  const sourceCount = new Set(recommendation.sourceDocumentIds).size;
  if (sourceCount < policy.lowCorroborationSources) {
    return { ...base, confidence: recommendation.confidence * policy.lowCorroborationFactor };
  }
  if (sourceCount >= policy.highCorroborationSources && classification.hasLocalSignal) {
    return { ...base, confidence: Math.min(recommendation.confidence * policy.highCorroborationFactor, 1.0) };
  }

  return base;
}

/**
 * Confidence first, then number of corroborating documents.
 */
export function compareRecommendations(a: RestaurantRecommendation, b: RestaurantRecommendation): number {
  if (b.confidence !== a.confidence) return b.confidence - a.confidence;
  return new Set(b.sourceDocumentIds).size - new Set(a.sourceDocumentIds).size;
}

export function mergeAndValidate(
  recommendations: readonly RestaurantRecommendation[],
  excluded: readonly string[],
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): RecommendationSet {
  const validated = mergeByName(recommendations).map(recommendation => crossValidate(recommendation, excluded, policy));

  return {
    recommendations: validated.filter(r => r.isRecommended).sort(compareRecommendations),
    filtered: validated.filter(r => !r.isRecommended),
  };
}
