// ═══════════════════════════════════════════════════════════════════════════════
// PREPROCESSING TESTS — Engagement Extraction and Coefficients
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { DEFAULT_SCORING_POLICY, type ScoringPolicy } from '../../../config/search.js';
import {
  engagementCoefficient,
  extractEngagement,
  preprocessComments,
  preprocessDocument,
} from '../preprocessing.js';

const ALLOWED_COEFFICIENTS = [1.0, 1.2, 1.5, 1.8, 2.0, 2.25, 3.0];

function isAllowed(value: number): boolean {
  return ALLOWED_COEFFICIENTS.some(allowed => Math.abs(allowed - value) < 1e-9);
}

// ─────────────────────────────────────────────────────────────────────────────────
// INLINE MARKUP
// ─────────────────────────────────────────────────────────────────────────────────

describe('extractEngagement', () => {
  it('should extract a plain count and strip the markup', () => {
    expect(extractEngagement('Great broth here [112 likes]')).toEqual({
      text: 'Great broth here',
      engagement: 112,
    });
  });

  it('should apply k and w multipliers', () => {
    expect(extractEngagement('[1.2k likes] queue is long').engagement).toBe(1200);
    expect(extractEngagement('本地人都去 [3w赞]').engagement).toBe(30000);
    expect(extractEngagement('老板人很好[1万赞]').engagement).toBe(10000);
  });

  it('should accept the singular form', () => {
    expect(extractEngagement('ok [1 like]')).toEqual({ text: 'ok', engagement: 1 });
  });

  it('should leave text without markup untouched', () => {
    const result = extractEngagement('No markup at all');
    expect(result.text).toBe('No markup at all');
    expect(result.engagement).toBeUndefined();
  });

  it('should use the first occurrence and strip all of them', () => {
    expect(extractEngagement('[7 likes] twice [9 likes]')).toEqual({ text: 'twice', engagement: 7 });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// COEFFICIENT
// ─────────────────────────────────────────────────────────────────────────────────

describe('engagementCoefficient', () => {
  it('should follow the step boundaries', () => {
    expect(engagementCoefficient(0, 0)).toBe(1.0);
    expect(engagementCoefficient(4, 0)).toBe(1.0);
    expect(engagementCoefficient(5, 0)).toBe(1.2);
    expect(engagementCoefficient(19, 0)).toBe(1.2);
    expect(engagementCoefficient(20, 0)).toBe(1.5);
    expect(engagementCoefficient(50, 0)).toBe(1.5);
    expect(engagementCoefficient(51, 0)).toBe(2.0);
    expect(engagementCoefficient(60, 0)).toBe(2.0);
  });

  it('should apply the sub-thread bonus only above 10 replies', () => {
    expect(engagementCoefficient(0, 10)).toBe(1.0);
    expect(engagementCoefficient(0, 11)).toBe(1.5);
    expect(engagementCoefficient(60, 11)).toBe(3.0);
    expect(engagementCoefficient(30, 12)).toBe(2.25);
  });

  it('should be monotonic in engagement and in the sub-thread indicator', () => {
    for (const subThreads of [0, 11]) {
      let previous = 0;
      for (let engagement = 0; engagement <= 200; engagement++) {
        const current = engagementCoefficient(engagement, subThreads);
        expect(current).toBeGreaterThanOrEqual(previous);
        expect(isAllowed(current)).toBe(true);
        previous = current;
      }
    }

    for (let engagement = 0; engagement <= 200; engagement += 7) {
      expect(engagementCoefficient(engagement, 11)).toBeGreaterThanOrEqual(engagementCoefficient(engagement, 0));
    }
  });

  it('should read its steps from the policy', () => {
    const policy: ScoringPolicy = {
      ...DEFAULT_SCORING_POLICY,
      engagementSteps: [{ above: 0, coefficient: 4 }],
    };
    expect(engagementCoefficient(1, 0, policy)).toBe(4);
    expect(engagementCoefficient(0, 0, policy)).toBe(1);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// NORMALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

describe('preprocessComments', () => {
  it('should prefer the explicit count over inline markup', () => {
    const [unit] = preprocessComments('doc1', [{ text: 'Try the lamb [3 likes]', likes: 60 }]);
    expect(unit).toEqual({
      id: 'doc1#c0',
      text: 'Try the lamb',
      engagement: 60,
      subThreadCount: 0,
      engagementCoefficient: 2.0,
    });
  });

  it('should fall back to inline markup when no count is given', () => {
    const [unit] = preprocessComments('doc1', [{ text: 'Locals queue here [25 likes]', subCommentCount: 11 }]);
    expect(unit?.engagement).toBe(25);
    expect(unit?.engagementCoefficient).toBe(2.25);
  });

  it('should skip empty comments but keep positional ids', () => {
    const units = preprocessComments('doc1', [{ text: '   ' }, { text: 'second' }]);
    expect(units).toHaveLength(1);
    expect(units[0]?.id).toBe('doc1#c1');
  });

  it('should cap the unit list and preserve order', () => {
    const comments = Array.from({ length: 40 }, (_, i) => ({ text: `comment ${i}` }));
    const units = preprocessComments('doc1', comments);

    expect(units).toHaveLength(30);
    expect(units[0]?.text).toBe('comment 0');
    expect(units[29]?.text).toBe('comment 29');
  });

  it('should normalize a whole document', () => {
    const units = preprocessDocument({
      id: 'n42',
      title: 'Noodles',
      text: '',
      comments: [{ text: 'Old Noodle House is the real deal', likes: 8 }],
    });
    expect(units.map(unit => unit.id)).toEqual(['n42#c0']);
    expect(units[0]?.engagementCoefficient).toBe(1.2);
  });
});
