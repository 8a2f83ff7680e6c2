// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH & SCORING POLICY — Tunable Constants for Evidence Gathering and Trust
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every threshold the scoring engine and the orchestrator apply lives here so
// tests and deployments can override it without touching the algorithms.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { envBool, envFloat, envNumber, envString } from './env.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type DocumentSort = 'general' | 'newest' | 'popular' | 'most_comments';

export interface SearchPolicy {
  /** Documents requested per query */
  readonly perQueryLimit: number;
  readonly sort: DocumentSort;

  /** false = fast mode: stop gathering once fastModeLimit documents are in */
  readonly deepSearch: boolean;
  readonly fastModeLimit: number;

  /** Each document-source call is cut off after this long and counts as empty */
  readonly queryTimeoutMs: number;

  /** Concurrent queries inside one phase */
  readonly phaseConcurrency: number;

  /** Concurrent document analyses (preprocess → tag → score) */
  readonly analysisConcurrency: number;

  readonly phase1QueryCap: number;
  readonly phase2QueryCap: number;
  /** Candidate names pulled from titles before phase 3 */
  readonly phase3NameCap: number;
  /** Names considered for phase 3 queries, paired two per query */
  readonly phase3VerifyCap: number;
}

export interface EngagementStep {
  /** Engagement count strictly above this value earns the coefficient */
  readonly above: number;
  readonly coefficient: number;
}

export interface ClassificationThresholds {
  readonly genuine: { readonly minStrong: number; readonly minTotal: number; readonly confidence: number };
  readonly likelyGenuine: { readonly minStrong: number; readonly minTotal: number; readonly confidence: number };
  readonly likelyPromotedConfidence: number;
  readonly unknownConfidence: number;
}

export interface ScoringPolicy {
  /** Comments kept per document */
  readonly maxComments: number;

  /** Ordered highest first; anything below the last step earns baseCoefficient */
  readonly engagementSteps: readonly EngagementStep[];
  readonly baseCoefficient: number;
  readonly subThreadThreshold: number;
  readonly subThreadMultiplier: number;

  readonly identityCoefficients: { readonly strong: number; readonly medium: number; readonly none: number };
  readonly correctionCoefficient: number;
  readonly negativeCoefficient: number;
  readonly neutralCoefficient: number;

  readonly classification: ClassificationThresholds;

  /** Merge adjustments applied after cross-validation */
  readonly lowCorroborationSources: number;
  readonly lowCorroborationFactor: number;
  readonly highCorroborationSources: number;
  readonly highCorroborationFactor: number;

  /** Unit scores kept as "top comments" on a shop */
  readonly topUnitsPerShop: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// DEFAULTS
// ─────────────────────────────────────────────────────────────────────────────────

export const DEFAULT_SEARCH_POLICY: SearchPolicy = {
  perQueryLimit: 4,
  sort: 'most_comments',
  deepSearch: true,
  fastModeLimit: 10,
  queryTimeoutMs: 15000,
  phaseConcurrency: 3,
  analysisConcurrency: 4,
  phase1QueryCap: 3,
  phase2QueryCap: 3,
  phase3NameCap: 6,
  phase3VerifyCap: 4,
};

export const DEFAULT_SCORING_POLICY: ScoringPolicy = {
  maxComments: 30,
  engagementSteps: [
    { above: 50, coefficient: 2.0 },
    { above: 19, coefficient: 1.5 },
    { above: 4, coefficient: 1.2 },
  ],
  baseCoefficient: 1.0,
  subThreadThreshold: 10,
  subThreadMultiplier: 1.5,
  identityCoefficients: { strong: 3.0, medium: 2.0, none: 1.0 },
  correctionCoefficient: 3.0,
  negativeCoefficient: 1.5,
  neutralCoefficient: 1.0,
  classification: {
    genuine: { minStrong: 2, minTotal: 10, confidence: 0.9 },
    likelyGenuine: { minStrong: 1, minTotal: 5, confidence: 0.75 },
    likelyPromotedConfidence: 0.6,
    unknownConfidence: 0.5,
  },
  lowCorroborationSources: 2,
  lowCorroborationFactor: 0.7,
  highCorroborationSources: 3,
  highCorroborationFactor: 1.2,
  topUnitsPerShop: 5,
};

// ─────────────────────────────────────────────────────────────────────────────────
// LOAD FROM ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

const SORTS: readonly DocumentSort[] = ['general', 'newest', 'popular', 'most_comments'];

function isDocumentSort(value: string): value is DocumentSort {
  return SORTS.some(sort => sort === value);
}

export function loadSearchPolicy(): SearchPolicy {
  const sort = envString('SEARCH_SORT', DEFAULT_SEARCH_POLICY.sort);

  return {
    ...DEFAULT_SEARCH_POLICY,
    perQueryLimit: envNumber('SEARCH_PER_QUERY_LIMIT', DEFAULT_SEARCH_POLICY.perQueryLimit),
    sort: isDocumentSort(sort) ? sort : DEFAULT_SEARCH_POLICY.sort,
    deepSearch: envBool('SEARCH_DEEP', DEFAULT_SEARCH_POLICY.deepSearch),
    fastModeLimit: envNumber('SEARCH_FAST_MODE_LIMIT', DEFAULT_SEARCH_POLICY.fastModeLimit),
    queryTimeoutMs: envNumber('SEARCH_QUERY_TIMEOUT_MS', DEFAULT_SEARCH_POLICY.queryTimeoutMs),
    phaseConcurrency: envNumber('SEARCH_PHASE_CONCURRENCY', DEFAULT_SEARCH_POLICY.phaseConcurrency),
    analysisConcurrency: envNumber('SEARCH_ANALYSIS_CONCURRENCY', DEFAULT_SEARCH_POLICY.analysisConcurrency),
  };
}

export function loadScoringPolicy(): ScoringPolicy {
  const base = DEFAULT_SCORING_POLICY;

  return {
    ...base,
    maxComments: envNumber('SCORING_MAX_COMMENTS', base.maxComments),
    classification: {
      ...base.classification,
      genuine: {
        ...base.classification.genuine,
        minTotal: envFloat('SCORING_GENUINE_MIN_TOTAL', base.classification.genuine.minTotal),
      },
      likelyGenuine: {
        ...base.classification.likelyGenuine,
        minTotal: envFloat('SCORING_LIKELY_GENUINE_MIN_TOTAL', base.classification.likelyGenuine.minTotal),
      },
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATE
// ─────────────────────────────────────────────────────────────────────────────────

export function validateSearchPolicy(policy: SearchPolicy): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (policy.perQueryLimit < 1 || policy.perQueryLimit > 20) {
    errors.push('perQueryLimit must be between 1 and 20');
  }

  if (policy.fastModeLimit < 1) {
    errors.push('fastModeLimit must be at least 1');
  }

  if (policy.queryTimeoutMs < 100 || policy.queryTimeoutMs > 120000) {
    errors.push('queryTimeoutMs must be between 100 and 120000');
  }

  if (policy.phaseConcurrency < 1 || policy.phaseConcurrency > 4) {
    errors.push('phaseConcurrency must be between 1 and 4');
  }

  if (policy.analysisConcurrency < 1 || policy.analysisConcurrency > 16) {
    errors.push('analysisConcurrency must be between 1 and 16');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

export function validateScoringPolicy(policy: ScoringPolicy): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (policy.maxComments < 1 || policy.maxComments > 200) {
    errors.push('maxComments must be between 1 and 200');
  }

  for (let i = 1; i < policy.engagementSteps.length; i++) {
    const previous = policy.engagementSteps[i - 1];
    const current = policy.engagementSteps[i];
    if (previous && current && (current.above >= previous.above || current.coefficient > previous.coefficient)) {
      errors.push('engagementSteps must be ordered by descending threshold and coefficient');
      break;
    }
  }

  const { genuine, likelyGenuine } = policy.classification;
  if (genuine.confidence < likelyGenuine.confidence) {
    errors.push('classification.genuine.confidence must not be below likelyGenuine.confidence');
  }

  for (const [label, value] of [
    ['genuine.confidence', genuine.confidence],
    ['likelyGenuine.confidence', likelyGenuine.confidence],
    ['likelyPromotedConfidence', policy.classification.likelyPromotedConfidence],
    ['unknownConfidence', policy.classification.unknownConfidence],
  ] as const) {
    if (value < 0 || value > 1) {
      errors.push(`classification.${label} must be between 0 and 1`);
    }
  }

  if (policy.lowCorroborationFactor <= 0 || policy.lowCorroborationFactor > 1) {
    errors.push('lowCorroborationFactor must be in (0, 1]');
  }

  if (policy.highCorroborationFactor < 1) {
    errors.push('highCorroborationFactor must be at least 1');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
