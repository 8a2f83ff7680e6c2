// ═══════════════════════════════════════════════════════════════════════════════
// SCORING ENGINE TESTS — Weights, Aggregation, Classification
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { DEFAULT_SCORING_POLICY, type ScoringPolicy } from '../../../config/search.js';
import {
  aggregate,
  classify,
  contentCoefficient,
  normalizeShopName,
  rankShops,
  score,
  scoreUnits,
} from '../scoring/engine.js';
import type { NormalizedCommentUnit, SemanticTag, ShopScore } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// FIXTURES
// ─────────────────────────────────────────────────────────────────────────────────

function unit(id: string, engagementCoefficient: number, text = `comment ${id}`): NormalizedCommentUnit {
  return { id, text, engagement: 0, subThreadCount: 0, engagementCoefficient };
}

function tag(unitId: string, overrides: Partial<SemanticTag> = {}): SemanticTag {
  return {
    unitId,
    identity: 'none',
    sentiment: 'neutral',
    isCorrection: false,
    mentionedShops: [],
    ...overrides,
  };
}

function shopOf(shops: Map<string, ShopScore>, key: string): ShopScore {
  const shop = shops.get(key);
  if (!shop) throw new Error(`missing shop ${key}`);
  return shop;
}

// ─────────────────────────────────────────────────────────────────────────────────
// UNIT SCORE
// ─────────────────────────────────────────────────────────────────────────────────

describe('score', () => {
  it('should multiply the three factors without rounding (4.5, not 6.0)', () => {
    const result = score(unit('u1', 1.5), tag('u1', { identity: 'strong', sentiment: 'positive' }));

    expect(result.weight).toBe(4.5);
    expect(result.weight).not.toBe(6.0);
    expect(result.engagementCoefficient).toBe(1.5);
    expect(result.identityCoefficient).toBe(3.0);
    expect(result.contentCoefficient).toBe(1.0);
  });

  it('should weigh a strong-identity correction at 18.0 with engagement 2.0', () => {
    const result = score(unit('u1', 2.0), tag('u1', { identity: 'strong', isCorrection: true }));
    expect(result.weight).toBe(18.0);
  });

  it('should let a correction override negative sentiment', () => {
    expect(contentCoefficient(true, 'negative')).toBe(3.0);
    expect(contentCoefficient(false, 'negative')).toBe(1.5);
    expect(contentCoefficient(false, 'positive')).toBe(1.0);
  });

  it('should leave units without a tag out of the evidence', () => {
    const scores = scoreUnits([unit('a', 1), unit('b', 1)], [tag('b'), tag('zzz')]);
    expect(scores.map(s => s.unitId)).toEqual(['b']);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// AGGREGATION
// ─────────────────────────────────────────────────────────────────────────────────

describe('aggregate', () => {
  it('should merge names that differ only in case and whitespace', () => {
    const scores = [
      score(unit('u1', 1.0), tag('u1', { mentionedShops: ['Old Store '] })),
      score(unit('u2', 1.2), tag('u2', { mentionedShops: ['old  store'] })),
      score(unit('u3', 1.0), tag('u3', { mentionedShops: ['Old Store Branch 2'] })),
    ];

    const shops = aggregate(scores);

    expect([...shops.keys()].sort()).toEqual(['old store', 'old store branch 2']);
    expect(shopOf(shops, 'old store').mentionCount).toBe(2);
    expect(shopOf(shops, 'old store').name).toBe('Old Store');
    expect(shopOf(shops, 'old store').totalWeight).toBeCloseTo(2.2, 10);
  });

  it('should count a unit once per shop and credit every shop it mentions', () => {
    const scores = [
      score(unit('u1', 2.0), tag('u1', { mentionedShops: ['Alpha Diner', 'alpha diner', 'Beta Grill'] })),
    ];

    const shops = aggregate(scores);

    expect(shopOf(shops, 'alpha diner').mentionCount).toBe(1);
    expect(shopOf(shops, 'alpha diner').totalWeight).toBe(2.0);
    expect(shopOf(shops, 'beta grill').totalWeight).toBe(2.0);
  });

  it('should sort contributing units heaviest first', () => {
    const scores = [
      score(unit('light', 1.0), tag('light', { mentionedShops: ['Corner Kitchen'] })),
      score(unit('heavy', 2.0), tag('heavy', { identity: 'strong', mentionedShops: ['Corner Kitchen'] })),
    ];

    const shop = shopOf(aggregate(scores), 'corner kitchen');
    expect(shop.topUnits.map(u => u.unitId)).toEqual(['heavy', 'light']);
  });

  it('should track identity, correction and sentiment counts with reasons', () => {
    const scores = [
      score(unit('u1', 1.0), tag('u1', { identity: 'strong', isCorrection: true, mentionedShops: ['Tiny Eatery'] })),
      score(unit('u2', 1.0), tag('u2', { identity: 'medium', sentiment: 'positive', mentionedShops: ['Tiny Eatery'] })),
    ];

    const shop = shopOf(aggregate(scores), 'tiny eatery');

    expect(shop.strongIdentityCount).toBe(1);
    expect(shop.localSignalCount).toBe(2);
    expect(shop.correctionCount).toBe(1);
    expect(shop.positiveCount).toBe(1);
    expect(shop.reasons).toEqual([
      '2 local-resident comments',
      '1 correction comment',
      'mentioned in 2 comments',
    ]);
  });

  it('should ignore blank shop names', () => {
    const shops = aggregate([score(unit('u1', 1), tag('u1', { mentionedShops: ['  ', ''] }))]);
    expect(shops.size).toBe(0);
  });

  it('should rank shops by total weight', () => {
    const shops = aggregate([
      score(unit('u1', 1.0), tag('u1', { mentionedShops: ['Small'] })),
      score(unit('u2', 2.0), tag('u2', { mentionedShops: ['Big'] })),
    ]);
    expect(rankShops(shops).map(s => s.name)).toEqual(['Big', 'Small']);
  });

  it('should normalize names the same way everywhere', () => {
    expect(normalizeShopName('  Old\tNoodle   House ')).toBe('old noodle house');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CLASSIFICATION
// ─────────────────────────────────────────────────────────────────────────────────

describe('classify', () => {
  it('should rate one strong correction at 18.0 as likely genuine', () => {
    const shops = aggregate([
      score(unit('u1', 2.0), tag('u1', { identity: 'strong', isCorrection: true, mentionedShops: ['Old Noodle House'] })),
    ]);
    const shop = shopOf(shops, 'old noodle house');

    expect(shop.totalWeight).toBe(18.0);
    expect(shop.strongIdentityCount).toBe(1);

    const result = classify(shop);
    expect(result.verdict).toBe('likely_genuine');
    expect(result.confidence).toBe(0.75);
    expect(result.hasLocalSignal).toBe(true);
  });

  it('should rate two strong mentions above 10 as genuine', () => {
    const shops = aggregate([
      score(unit('u1', 2.0), tag('u1', { identity: 'strong', mentionedShops: ['Harbour Canteen'] })),
      score(unit('u2', 2.0), tag('u2', { identity: 'strong', mentionedShops: ['Harbour Canteen'] })),
    ]);

    const result = classify(shopOf(shops, 'harbour canteen'));
    expect(result.verdict).toBe('genuine');
    expect(result.confidence).toBe(0.9);
  });

  it('should rate a mostly negative shop as likely promoted', () => {
    const shops = aggregate([
      score(unit('u1', 1.0), tag('u1', { sentiment: 'negative', mentionedShops: ['Glossy Cafe'] })),
      score(unit('u2', 1.0), tag('u2', { sentiment: 'negative', mentionedShops: ['Glossy Cafe'] })),
      score(unit('u3', 1.0), tag('u3', { sentiment: 'positive', mentionedShops: ['Glossy Cafe'] })),
    ]);

    const result = classify(shopOf(shops, 'glossy cafe'));
    expect(result.verdict).toBe('likely_promoted');
    expect(result.confidence).toBe(0.6);
  });

  it('should fall back to unknown', () => {
    const shops = aggregate([score(unit('u1', 1.0), tag('u1', { mentionedShops: ['Quiet Place'] }))]);
    const result = classify(shopOf(shops, 'quiet place'));

    expect(result.verdict).toBe('unknown');
    expect(result.confidence).toBe(0.5);
    expect(result.hasLocalSignal).toBe(false);
  });

  it('should take its thresholds from the policy', () => {
    const policy: ScoringPolicy = {
      ...DEFAULT_SCORING_POLICY,
      classification: {
        ...DEFAULT_SCORING_POLICY.classification,
        genuine: { minStrong: 1, minTotal: 1, confidence: 0.95 },
      },
    };
    const shops = aggregate([
      score(unit('u1', 1.0), tag('u1', { identity: 'strong', mentionedShops: ['Quiet Place'] })),
    ]);

    expect(classify(shopOf(shops, 'quiet place'), policy)).toMatchObject({ verdict: 'genuine', confidence: 0.95 });
  });
});
