// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT ANALYZER — Preprocess → Tag → Score → Per-Document Recommendations
// ═══════════════════════════════════════════════════════════════════════════════

import { DEFAULT_SCORING_POLICY, type ScoringPolicy } from '../../../config/search.js';
import { getLogger } from '../../../observability/logging/index.js';
import { appError, err, ok, type AsyncAppResult } from '../../../types/result.js';
import { detectCategories } from '../categories.js';
import { preprocessDocument } from '../preprocessing.js';
import { aggregate, classify, rankShops, scoreUnits } from '../scoring/engine.js';
import type { LegacyAnalyzer } from '../tagging/legacy-analyzer.js';
import type { SemanticTagger } from '../tagging/semantic-tagger.js';
import type {
  RestaurantRecommendation,
  SearchIntent,
  ShopScore,
  SourceDocument,
} from '../types.js';

export type AnalysisErrorCode = 'ANALYSIS_FAILED';

export interface DocumentAnalysis {
  readonly documentId: string;
  readonly recommendations: readonly RestaurantRecommendation[];
  /** Shop scores from the tagged path; empty on the legacy path */
  readonly shopScores: readonly ShopScore[];
  readonly mode: 'tagged' | 'legacy' | 'empty';
}

export interface DocumentAnalyzerDeps {
  readonly tagger: SemanticTagger;
  readonly legacy: LegacyAnalyzer;
  readonly policy?: ScoringPolicy;
}

const logger = getLogger({ component: 'document-analyzer' });

/**
 * One recommendation per scored shop. Features are the score reasons plus
 * the food categories spotted in the comments that mention the shop.
 */
export function shopToRecommendation(
  shop: ShopScore,
  documentId: string,
  intent: SearchIntent,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): RestaurantRecommendation {
  const classification = classify(shop, policy);
  const categories = detectCategories(shop.topUnits.map(unit => unit.text));

  return {
    name: shop.name,
    location: intent.location,
    features: [...new Set([...shop.reasons, ...categories])],
    sourceDocumentIds: [documentId],
    confidence: classification.confidence,
    classification,
    isRecommended: classification.verdict !== 'promoted' && classification.verdict !== 'likely_promoted',
  };
}

export class DocumentAnalyzer {
  private readonly policy: ScoringPolicy;

  constructor(private readonly deps: DocumentAnalyzerDeps) {
    this.policy = deps.policy ?? DEFAULT_SCORING_POLICY;
  }

  async analyze(document: SourceDocument, intent: SearchIntent): AsyncAppResult<DocumentAnalysis, AnalysisErrorCode> {
    const units = preprocessDocument(document, this.policy);
    if (units.length === 0) {
      return ok({ documentId: document.id, recommendations: [], shopScores: [], mode: 'empty' });
    }

    const tagged = await this.deps.tagger.tag(units, { documentTitle: document.title, location: intent.location });

    if (tagged.ok) {
      const shops = rankShops(aggregate(scoreUnits(units, tagged.value, this.policy), this.policy));
      return ok({
        documentId: document.id,
        recommendations: shops.map(shop => shopToRecommendation(shop, document.id, intent, this.policy)),
        shopScores: shops,
        mode: 'tagged',
      });
    }

    logger.warn('Tagging failed, falling back to single-pass analysis', {
      documentId: document.id,
      code: tagged.error.code,
    });

    const legacy = await this.deps.legacy.analyze(document, intent);
    if (!legacy.ok) {
      return err(
        appError('ANALYSIS_FAILED', `Document ${document.id} could not be analysed`, {
          cause: legacy.error.cause,
          context: { taggerError: tagged.error.code, legacyError: legacy.error.code },
        })
      );
    }

    return ok({ documentId: document.id, recommendations: legacy.value, shopScores: [], mode: 'legacy' });
  }
}
