// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH ORCHESTRATOR — One Conversation Turn, Start to Finish
// ═══════════════════════════════════════════════════════════════════════════════
//
// Fresh search:
//   step1 intent → step2 gather → step3 analyse (bounded pool) →
//   step4 merge & cross-validate → step5 enrich (streamed) → step6 compose
//
// Follow-up:
//   step1 classify → handler → step5 enrich what is new → step6 compose
//
// A document whose analysis fails is logged and left out; the batch goes on.
//
// ═══════════════════════════════════════════════════════════════════════════════

import {
  DEFAULT_SCORING_POLICY,
  DEFAULT_SEARCH_POLICY,
  type ScoringPolicy,
  type SearchPolicy,
} from '../../config/search.js';
import { getLogger } from '../../observability/logging/index.js';
import type { StepId } from '../streaming/types.js';
import type { TurnEmitter } from '../streaming/step-tracker.js';
import type { DocumentAnalyzer } from './analysis/document-analyzer.js';
import { mapWithConcurrency } from './concurrency.js';
import type { ConversationContext } from './context.js';
import type { FollowUpClassifier } from './follow-up/classifier.js';
import { handleFollowUp, type ExpansionResult, type FollowUpOnlyAction } from './handlers.js';
import type { IntentParser } from './intent/intent-parser.js';
import { mergeAndValidate } from './merge.js';
import type { PoiEnricher } from './poi/enricher.js';
import type { EvidenceGatherer } from './strategy/evidence-gatherer.js';
import type { RestaurantRecommendation, SearchIntent, SourceDocument, TurnOutcome } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface SearchOrchestratorDeps {
  readonly intentParser: IntentParser;
  readonly classifier: FollowUpClassifier;
  readonly gatherer: EvidenceGatherer;
  readonly analyzer: DocumentAnalyzer;
  readonly enricher: PoiEnricher;
  readonly searchPolicy?: SearchPolicy;
  readonly scoringPolicy?: ScoringPolicy;
}

/**
 * Step reporting that does nothing. For callers that only want the outcome.
 */
export const SILENT_EMITTER: TurnEmitter = {
  stepStart: () => undefined,
  stepDone: () => undefined,
  stepError: () => undefined,
  restaurant: () => undefined,
};

const logger = getLogger({ component: 'search-orchestrator' });

const CLARIFY_SUMMARY = 'I need a little more to go on.';

// ─────────────────────────────────────────────────────────────────────────────────
// ORCHESTRATOR
// ─────────────────────────────────────────────────────────────────────────────────

export class SearchOrchestrator {
  private readonly searchPolicy: SearchPolicy;
  private readonly scoringPolicy: ScoringPolicy;

  constructor(private readonly deps: SearchOrchestratorDeps) {
    this.searchPolicy = deps.searchPolicy ?? DEFAULT_SEARCH_POLICY;
    this.scoringPolicy = deps.scoringPolicy ?? DEFAULT_SCORING_POLICY;
  }

  /**
   * Classify the turn, run it, and record it on the context.
   */
  async runTurn(text: string, context: ConversationContext, emitter: TurnEmitter = SILENT_EMITTER): Promise<TurnOutcome> {
    // No result set held yet: there is nothing to follow up on
    const action = context.lastIntent
      ? await this.deps.classifier.classify(text, context)
      : ({ type: 'new_search' } as const);

    context.addMessage('user', text);

    const outcome =
      action.type === 'new_search'
        ? await this.runNewSearch(text, context, emitter)
        : await this.runFollowUp(action, context, emitter);

    context.addMessage('assistant', outcome.summary);
    context.completeTurn();

    logger.info('Turn completed', {
      action: outcome.action,
      status: outcome.status,
      recommendations: outcome.recommendations.length,
      filtered: outcome.filteredCount,
    });

    return outcome;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // FRESH SEARCH
  // ─────────────────────────────────────────────────────────────────────────────

  async runNewSearch(text: string, context: ConversationContext, emitter: TurnEmitter): Promise<TurnOutcome> {
    emitter.stepStart('step1');
    const parsed = await this.deps.intentParser.parse(text, context.lastIntent);

    if (parsed.kind !== 'intent') {
      emitter.stepDone('step1');
      return {
        status: 'clarify',
        action: 'new_search',
        summary: parsed.kind === 'error' ? parsed.message : CLARIFY_SUMMARY,
        questions: parsed.kind === 'clarify' ? parsed.questions : [],
        recommendations: [],
        filtered: [],
        filteredCount: 0,
      };
    }

    const intent = parsed.intent;
    emitter.stepDone('step1');

    emitter.stepStart('step2');
    const gathered = await this.deps.gatherer.gather(intent);
    emitter.stepDone('step2');

    const documentIds = gathered.documents.map(document => document.id);

    if (gathered.documents.length === 0) {
      context.startSearch(intent, { recommendations: [], filtered: [] }, []);
      return {
        status: 'no_results',
        action: 'new_search',
        summary: `No posts turned up for ${describeIntent(intent)}.`,
        recommendations: [],
        filtered: [],
        filteredCount: 0,
        intent,
      };
    }

    emitter.stepStart('step3');
    const candidates = await this.analyzeAll(gathered.documents, intent);
    emitter.stepDone('step3');

    emitter.stepStart('step4');
    const set = mergeAndValidate(candidates, [...intent.excludeKeywords, ...context.excludedShops], this.scoringPolicy);
    context.startSearch(intent, set, documentIds);
    emitter.stepDone('step4');

    const recommendations = await this.enrichAll(set.recommendations, intent.location, context, emitter);

    emitter.stepStart('step6');
    const summary = composeSearchSummary(intent, recommendations, set.filtered.length);
    emitter.stepDone('step6');

    return {
      status: recommendations.length > 0 ? 'ok' : 'no_results',
      action: 'new_search',
      summary,
      recommendations,
      filtered: set.filtered,
      filteredCount: set.filtered.length,
      intent,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // FOLLOW-UP
  // ─────────────────────────────────────────────────────────────────────────────

  async runFollowUp(
    action: FollowUpOnlyAction,
    context: ConversationContext,
    emitter: TurnEmitter
  ): Promise<TurnOutcome> {
    emitter.stepStart('step1');
    emitter.stepDone('step1');

    const handled = await handleFollowUp(action, {
      context,
      searchExpansion: (intent, excludeIds) => this.searchExpansion(intent, excludeIds, context),
    });

    const city = context.lastIntent?.location ?? '';
    const recommendations = await this.enrichAll(handled.recommendations, city, context, emitter);

    emitter.stepStart('step6');
    emitter.stepDone('step6');

    return { ...handled, recommendations, intent: handled.intent ?? context.lastIntent };
  }

  private async searchExpansion(
    intent: SearchIntent,
    excludeIds: ReadonlySet<string>,
    context: ConversationContext
  ): Promise<ExpansionResult> {
    const gathered = await this.deps.gatherer.gatherExpansion(intent, { excludeIds });
    const candidates = await this.analyzeAll(gathered.documents, intent);

    return {
      set: mergeAndValidate(candidates, [...intent.excludeKeywords, ...context.excludedShops], this.scoringPolicy),
      documentIds: gathered.documents.map(document => document.id),
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // SHARED STAGES
  // ─────────────────────────────────────────────────────────────────────────────

  private async analyzeAll(
    documents: readonly SourceDocument[],
    intent: SearchIntent
  ): Promise<RestaurantRecommendation[]> {
    const perDocument = await mapWithConcurrency(documents, this.searchPolicy.analysisConcurrency, async document => {
      try {
        const result = await this.deps.analyzer.analyze(document, intent);
        if (!result.ok) {
          logger.warn('Document skipped', { documentId: document.id, code: result.error.code });
          return [];
        }
        return result.value.recommendations;
      } catch (error) {
        logger.error('Document analysis threw', error, { documentId: document.id });
        return [];
      }
    });

    return perDocument.flat();
  }

  /**
   * Step 5. Each recommendation without enrichment is looked up, reported as
   * soon as it is ready and written back to the context.
   */
  private async enrichAll(
    recommendations: readonly RestaurantRecommendation[],
    city: string,
    context: ConversationContext,
    emitter: TurnEmitter
  ): Promise<RestaurantRecommendation[]> {
    const step: StepId = 'step5';
    emitter.stepStart(step);

    const output: RestaurantRecommendation[] = [];
    for (const [position, recommendation] of recommendations.entries()) {
      const ready = recommendation.enrichment ? recommendation : await this.deps.enricher.enrich(recommendation, city);
      context.updateRecommendation(ready);
      emitter.restaurant(ready, position);
      output.push(ready);
    }

    emitter.stepDone(step);
    return output;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

export function describeIntent(intent: SearchIntent): string {
  return intent.foodType ? `${intent.foodType} in ${intent.location}` : intent.location;
}

export function composeSearchSummary(
  intent: SearchIntent,
  recommendations: readonly RestaurantRecommendation[],
  filteredCount: number
): string {
  if (recommendations.length === 0) {
    return filteredCount > 0
      ? `Every place found for ${describeIntent(intent)} looked promoted or was excluded (${filteredCount} filtered).`
      : `No trustworthy places found for ${describeIntent(intent)}.`;
  }

  const top = recommendations
    .slice(0, 3)
    .map(r => r.name)
    .join(', ');
  const filteredNote = filteredCount > 0 ? ` ${filteredCount} filtered as promoted or excluded.` : '';
  return `Found ${recommendations.length} places for ${describeIntent(intent)}. Top picks: ${top}.${filteredNote}`;
}
