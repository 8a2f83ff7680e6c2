// ═══════════════════════════════════════════════════════════════════════════════
// SCORING ENGINE — Unit Weights, Shop Aggregation, Trust Classification
// ═══════════════════════════════════════════════════════════════════════════════
//
// weight = engagement coefficient × identity coefficient × content coefficient
//
// All arithmetic lives here. The semantic tagger only supplies labels.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { DEFAULT_SCORING_POLICY, type ScoringPolicy } from '../../../config/search.js';
import type {
  NormalizedCommentUnit,
  SemanticTag,
  Sentiment,
  ShopClassification,
  ShopScore,
  UnitScore,
  IdentityStrength,
} from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// NAME NORMALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Merge key for shop names: trim, collapse whitespace, ignore case.
 * Deliberately not fuzzy.
 */
export function normalizeShopName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Display form: trim and collapse whitespace, keep the casing.
 */
export function cleanShopName(name: string): string {
  return name.trim().replace(/\s+/g, ' ');
}

// ─────────────────────────────────────────────────────────────────────────────────
// COEFFICIENTS
// ─────────────────────────────────────────────────────────────────────────────────

export function identityCoefficient(
  identity: IdentityStrength,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): number {
  return policy.identityCoefficients[identity];
}

/**
 * A correction outranks any sentiment.
 */
export function contentCoefficient(
  isCorrection: boolean,
  sentiment: Sentiment,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): number {
  if (isCorrection) return policy.correctionCoefficient;
  if (sentiment === 'negative') return policy.negativeCoefficient;
  return policy.neutralCoefficient;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCORE
// ─────────────────────────────────────────────────────────────────────────────────

export function score(
  unit: NormalizedCommentUnit,
  tag: SemanticTag,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): UnitScore {
  const identity = identityCoefficient(tag.identity, policy);
  const content = contentCoefficient(tag.isCorrection, tag.sentiment, policy);

  return {
    unitId: unit.id,
    text: unit.text,
    weight: unit.engagementCoefficient * identity * content,
    engagementCoefficient: unit.engagementCoefficient,
    identityCoefficient: identity,
    contentCoefficient: content,
    identity: tag.identity,
    sentiment: tag.sentiment,
    isCorrection: tag.isCorrection,
    mentionedShops: tag.mentionedShops,
  };
}

/**
 * Join units with their tags by id. Units without a tag are left out of
 * the evidence; tags for unknown ids are ignored.
 */
export function scoreUnits(
  units: readonly NormalizedCommentUnit[],
  tags: readonly SemanticTag[],
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): UnitScore[] {
  const byId = new Map(tags.map(tag => [tag.unitId, tag]));
  const scores: UnitScore[] = [];

  for (const unit of units) {
    const tag = byId.get(unit.id);
    if (tag) scores.push(score(unit, tag, policy));
  }

  return scores;
}

// ─────────────────────────────────────────────────────────────────────────────────
// AGGREGATE
// ─────────────────────────────────────────────────────────────────────────────────

interface ShopAccumulator {
  name: string;
  key: string;
  totalWeight: number;
  strongIdentityCount: number;
  localSignalCount: number;
  correctionCount: number;
  positiveCount: number;
  negativeCount: number;
  units: UnitScore[];
}

function buildReasons(acc: ShopAccumulator): string[] {
  const reasons: string[] = [];
  if (acc.localSignalCount > 0) {
    reasons.push(`${acc.localSignalCount} local-resident comment${acc.localSignalCount === 1 ? '' : 's'}`);
  }
  if (acc.correctionCount > 0) {
    reasons.push(`${acc.correctionCount} correction comment${acc.correctionCount === 1 ? '' : 's'}`);
  }
  if (acc.units.length >= 2) {
    reasons.push(`mentioned in ${acc.units.length} comments`);
  }
  return reasons;
}

/**
 * Fold unit scores into per-shop scores keyed by normalized name. A unit
 * mentioning several shops contributes its full weight to each, once.
 */
export function aggregate(
  unitScores: readonly UnitScore[],
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): Map<string, ShopScore> {
  const shops = new Map<string, ShopAccumulator>();

  for (const unit of unitScores) {
    const seen = new Set<string>();

    for (const rawName of unit.mentionedShops) {
      const key = normalizeShopName(rawName);
      if (!key || seen.has(key)) continue;
      seen.add(key);

      let acc = shops.get(key);
      if (!acc) {
        acc = {
          name: cleanShopName(rawName),
          key,
          totalWeight: 0,
          strongIdentityCount: 0,
          localSignalCount: 0,
          correctionCount: 0,
          positiveCount: 0,
          negativeCount: 0,
          units: [],
        };
        shops.set(key, acc);
      }

      acc.totalWeight += unit.weight;
      acc.units.push(unit);
      if (unit.identity === 'strong') acc.strongIdentityCount++;
      if (unit.identity !== 'none') acc.localSignalCount++;
      if (unit.isCorrection) acc.correctionCount++;
      if (unit.sentiment === 'positive') acc.positiveCount++;
      if (unit.sentiment === 'negative') acc.negativeCount++;
    }
  }

  const result = new Map<string, ShopScore>();
  for (const [key, acc] of shops) {
    const topUnits = [...acc.units].sort((a, b) => b.weight - a.weight);
    result.set(key, {
      name: acc.name,
      key,
      totalWeight: acc.totalWeight,
      mentionCount: acc.units.length,
      strongIdentityCount: acc.strongIdentityCount,
      localSignalCount: acc.localSignalCount,
      correctionCount: acc.correctionCount,
      positiveCount: acc.positiveCount,
      negativeCount: acc.negativeCount,
      topUnits: topUnits.slice(0, policy.topUnitsPerShop),
      reasons: buildReasons(acc),
    });
  }

  return result;
}

/**
 * Shops by total weight, heaviest first.
 */
export function rankShops(shops: ReadonlyMap<string, ShopScore>): ShopScore[] {
  return [...shops.values()].sort((a, b) => b.totalWeight - a.totalWeight);
}

// ─────────────────────────────────────────────────────────────────────────────────
// CLASSIFY
// ─────────────────────────────────────────────────────────────────────────────────

export function classify(
  shop: ShopScore,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): ShopClassification {
  const { genuine, likelyGenuine, likelyPromotedConfidence, unknownConfidence } = policy.classification;
  const hasLocalSignal = shop.strongIdentityCount > 0;
  const reasons = [...shop.reasons];

  if (shop.strongIdentityCount >= genuine.minStrong && shop.totalWeight > genuine.minTotal) {
    return { verdict: 'genuine', confidence: genuine.confidence, reasons, hasLocalSignal };
  }

  if (shop.strongIdentityCount >= likelyGenuine.minStrong && shop.totalWeight > likelyGenuine.minTotal) {
    return { verdict: 'likely_genuine', confidence: likelyGenuine.confidence, reasons, hasLocalSignal };
  }

  if (shop.negativeCount > shop.positiveCount) {
    return {
      verdict: 'likely_promoted',
      confidence: likelyPromotedConfidence,
      reasons: [...reasons, `${shop.negativeCount} negative vs ${shop.positiveCount} positive mentions`],
      hasLocalSignal,
    };
  }

  return { verdict: 'unknown', confidence: unknownConfidence, reasons, hasLocalSignal };
}
