// ═══════════════════════════════════════════════════════════════════════════════
// FOOD SEARCH TYPES — Evidence, Scores, Recommendations, Follow-Up Actions
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// INTENT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Parsed search request. Immutable once parsed; an "expand" turn reuses it verbatim.
 */
export interface SearchIntent {
  readonly location: string;
  readonly foodType?: string;
  readonly requirements: readonly string[];
  readonly excludeKeywords: readonly string[];
}

// ─────────────────────────────────────────────────────────────────────────────────
// SOURCE DOCUMENTS
// ─────────────────────────────────────────────────────────────────────────────────

export interface RawComment {
  readonly text: string;
  /** Explicit engagement (likes); when absent it may be embedded in the text */
  readonly likes?: number;
  readonly subCommentCount?: number;
  readonly author?: string;
}

export interface SourceDocument {
  /** External id; the dedupe key across all phases of one search */
  readonly id: string;
  readonly title: string;
  readonly text: string;
  readonly comments: readonly RawComment[];
}

// ─────────────────────────────────────────────────────────────────────────────────
// PREPROCESSING & TAGGING
// ─────────────────────────────────────────────────────────────────────────────────

export interface NormalizedCommentUnit {
  /** Stable within one document: `${documentId}#${position}` */
  readonly id: string;
  readonly text: string;
  readonly engagement: number;
  readonly subThreadCount: number;
  readonly engagementCoefficient: number;
}

export type IdentityStrength = 'none' | 'medium' | 'strong';
export type Sentiment = 'neutral' | 'positive' | 'negative';

export const IDENTITY_STRENGTHS: readonly IdentityStrength[] = ['none', 'medium', 'strong'];
export const SENTIMENTS: readonly Sentiment[] = ['neutral', 'positive', 'negative'];

export interface SemanticTag {
  readonly unitId: string;
  readonly identity: IdentityStrength;
  readonly sentiment: Sentiment;
  readonly isCorrection: boolean;
  readonly mentionedShops: readonly string[];
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCORES
// ─────────────────────────────────────────────────────────────────────────────────

export interface UnitScore {
  readonly unitId: string;
  readonly text: string;
  readonly weight: number;
  readonly engagementCoefficient: number;
  readonly identityCoefficient: number;
  readonly contentCoefficient: number;
  readonly identity: IdentityStrength;
  readonly sentiment: Sentiment;
  readonly isCorrection: boolean;
  readonly mentionedShops: readonly string[];
}

export interface ShopScore {
  /** Display name: first spelling seen */
  readonly name: string;
  /** Merge key: trimmed, whitespace-collapsed, lower-cased */
  readonly key: string;
  readonly totalWeight: number;
  readonly mentionCount: number;
  readonly strongIdentityCount: number;
  /** Medium or strong identity mentions */
  readonly localSignalCount: number;
  readonly correctionCount: number;
  readonly positiveCount: number;
  readonly negativeCount: number;
  /** Contributing units, heaviest first */
  readonly topUnits: readonly UnitScore[];
  readonly reasons: readonly string[];
}

export type ShopVerdict = 'genuine' | 'likely_genuine' | 'unknown' | 'likely_promoted' | 'promoted';

export interface ShopClassification {
  readonly verdict: ShopVerdict;
  readonly confidence: number;
  readonly reasons: readonly string[];
  readonly hasLocalSignal: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RECOMMENDATIONS
// ─────────────────────────────────────────────────────────────────────────────────

export interface MenuItemNote {
  readonly name: string;
  readonly reason?: string;
}

export interface RestaurantEnrichment {
  readonly address?: string;
  readonly phone?: string;
  readonly rating?: number;
  readonly photos: readonly string[];
  readonly businessArea?: string;
  readonly tags: readonly string[];
  readonly pros: readonly string[];
  readonly cons: readonly string[];
  readonly mustTry: readonly MenuItemNote[];
  readonly avoid: readonly MenuItemNote[];
  /** confidence × 10, one decimal */
  readonly trustScore: number;
}

export interface RestaurantRecommendation {
  readonly name: string;
  readonly location?: string;
  readonly features: readonly string[];
  readonly sourceDocumentIds: readonly string[];
  readonly confidence: number;
  readonly classification: ShopClassification;
  readonly isRecommended: boolean;
  readonly filterReason?: string;
  readonly enrichment?: RestaurantEnrichment;
}

/**
 * Result of merge and cross-validation: ranked keepers and what was filtered.
 */
export interface RecommendationSet {
  readonly recommendations: readonly RestaurantRecommendation[];
  readonly filtered: readonly RestaurantRecommendation[];
}

// ─────────────────────────────────────────────────────────────────────────────────
// FOLLOW-UP ACTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export type FollowUpType =
  | 'new_search'
  | 'exclude_filter'
  | 'category_filter'
  | 'location_filter'
  | 'expand'
  | 'detail'
  | 'confirm'
  | 'interpreted';

/**
 * Closed union of what a turn asks for. `interpreted` is the semantic
 * collaborator's answer when no rule matched.
 */
export type FollowUpAction =
  | { readonly type: 'new_search' }
  | { readonly type: 'exclude_filter'; readonly target: string }
  | { readonly type: 'category_filter'; readonly target: string }
  | { readonly type: 'location_filter'; readonly target: string }
  | { readonly type: 'expand' }
  | { readonly type: 'detail'; readonly target: string }
  | { readonly type: 'confirm' }
  | {
      readonly type: 'interpreted';
      readonly shops: readonly string[];
      readonly response: string;
      /** Interpreter unavailable or unparseable: keep the current list */
      readonly degraded: boolean;
    };

// ─────────────────────────────────────────────────────────────────────────────────
// TURN OUTCOME
// ─────────────────────────────────────────────────────────────────────────────────

export type TurnStatus = 'ok' | 'clarify' | 'no_results';

export interface TurnOutcome {
  readonly status: TurnStatus;
  readonly action: FollowUpType;
  readonly summary: string;
  readonly recommendations: readonly RestaurantRecommendation[];
  readonly filtered: readonly RestaurantRecommendation[];
  readonly filteredCount: number;
  readonly intent?: SearchIntent;
  readonly questions?: readonly string[];
}
