// ═══════════════════════════════════════════════════════════════════════════════
// SIGNAL PREPROCESSOR — Raw Comments → Normalized Units with Engagement Scores
// ═══════════════════════════════════════════════════════════════════════════════
//
// Everything here is pure. The engagement coefficient is the deterministic
// backbone of scoring; the semantic tagger is never asked to compute it.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { DEFAULT_SCORING_POLICY, type ScoringPolicy } from '../../config/search.js';
import type { NormalizedCommentUnit, RawComment, SourceDocument } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// INLINE ENGAGEMENT MARKUP
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Matches "[112 likes]", "[1.2k likes]", "[3w赞]", "[1万赞]".
 */
const ENGAGEMENT_MARKUP = /\[\s*(\d+(?:\.\d+)?)\s*([kKwW万])?\s*(?:赞|likes?)\s*\]/;
const ENGAGEMENT_MARKUP_GLOBAL = new RegExp(ENGAGEMENT_MARKUP.source, 'g');

const MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  K: 1_000,
  w: 10_000,
  W: 10_000,
  万: 10_000,
};

export interface ExtractedEngagement {
  readonly text: string;
  /** undefined when the text carried no markup */
  readonly engagement?: number;
}

/**
 * Pull an engagement count out of inline markup and strip every markup
 * occurrence from the text. The first occurrence wins.
 */
export function extractEngagement(text: string): ExtractedEngagement {
  const match = ENGAGEMENT_MARKUP.exec(text);
  if (!match) return { text };

  const [, digits = '0', suffix] = match;
  const multiplier = suffix ? (MULTIPLIERS[suffix] ?? 1) : 1;

  return {
    text: text.replace(ENGAGEMENT_MARKUP_GLOBAL, '').replace(/\s+/g, ' ').trim(),
    engagement: Math.floor(parseFloat(digits) * multiplier),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENGAGEMENT COEFFICIENT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Step function over engagement, times the sub-thread bonus.
 *
 * With the default policy: >50 → 2.0, 20–50 → 1.5, 5–19 → 1.2, else 1.0;
 * ×1.5 when more than 10 sub-thread replies.
 */
export function engagementCoefficient(
  engagement: number,
  subThreadCount: number,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): number {
  const count = Math.max(0, Math.floor(engagement));

  let coefficient = policy.baseCoefficient;
  for (const step of policy.engagementSteps) {
    if (count > step.above) {
      coefficient = step.coefficient;
      break;
    }
  }

  if (subThreadCount > policy.subThreadThreshold) {
    coefficient *= policy.subThreadMultiplier;
  }

  return coefficient;
}

// ─────────────────────────────────────────────────────────────────────────────────
// NORMALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

function nonNegativeInt(value: number | undefined): number | undefined {
  if (value === undefined || !Number.isFinite(value)) return undefined;
  return Math.max(0, Math.floor(value));
}

/**
 * Normalize one document's comments. Order is preserved, the list is capped
 * at `policy.maxComments`, and comments with no text after cleaning are
 * skipped (their position still counts toward the unit id).
 */
export function preprocessComments(
  documentId: string,
  comments: readonly RawComment[],
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): NormalizedCommentUnit[] {
  const units: NormalizedCommentUnit[] = [];

  comments.slice(0, policy.maxComments).forEach((comment, position) => {
    const extracted = extractEngagement(comment.text);
    const text = extracted.text || comment.text.trim();
    if (!text) return;

    const engagement = nonNegativeInt(comment.likes) ?? extracted.engagement ?? 0;
    const subThreadCount = nonNegativeInt(comment.subCommentCount) ?? 0;

    units.push({
      id: `${documentId}#c${position}`,
      text,
      engagement,
      subThreadCount,
      engagementCoefficient: engagementCoefficient(engagement, subThreadCount, policy),
    });
  });

  return units;
}

export function preprocessDocument(
  document: SourceDocument,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): NormalizedCommentUnit[] {
  return preprocessComments(document.id, document.comments, policy);
}
