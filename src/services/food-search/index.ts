// ═══════════════════════════════════════════════════════════════════════════════
// FOOD SEARCH — Orchestrator Assembly from Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import type { AppConfig } from '../../config/index.js';
import { getLogger } from '../../observability/logging/index.js';
import { DocumentAnalyzer } from './analysis/document-analyzer.js';
import { FollowUpClassifier } from './follow-up/classifier.js';
import { LLMFollowUpInterpreter, type FollowUpInterpreter } from './follow-up/llm-interpreter.js';
import { LLMIntentParser, type IntentParser } from './intent/intent-parser.js';
import { SearchOrchestrator } from './orchestrator.js';
import { HttpPoiClient, NoopPoiClient, PoiEnricher, type PoiClient } from './poi/enricher.js';
import { HttpDocumentSource, UnconfiguredDocumentSource, type DocumentSource } from './sources/document-source.js';
import { EvidenceGatherer } from './strategy/evidence-gatherer.js';
import { LLMLegacyAnalyzer, type LegacyAnalyzer } from './tagging/legacy-analyzer.js';
import { LLMSemanticTagger, type SemanticTagger } from './tagging/semantic-tagger.js';

export { SearchOrchestrator } from './orchestrator.js';
export { ConversationContext } from './context.js';
export type * from './types.js';

/**
 * Collaborators to use instead of the configured ones.
 */
export interface CollaboratorOverrides {
  readonly documentSource?: DocumentSource;
  readonly tagger?: SemanticTagger;
  readonly legacy?: LegacyAnalyzer;
  readonly intentParser?: IntentParser;
  readonly interpreter?: FollowUpInterpreter;
  readonly poiClient?: PoiClient;
}

const logger = getLogger({ component: 'food-search' });

function documentSourceFrom(config: AppConfig): DocumentSource {
  const { documentSourceUrl, documentSourceToken, userAgent } = config.sources;
  if (!documentSourceUrl) {
    logger.warn('DOCUMENT_SOURCE_URL not set: searches will find nothing');
    return new UnconfiguredDocumentSource();
  }
  return new HttpDocumentSource({
    baseUrl: documentSourceUrl,
    token: documentSourceToken,
    timeoutMs: config.search.queryTimeoutMs,
    userAgent,
  });
}

function poiClientFrom(config: AppConfig): PoiClient {
  const { poiServiceUrl, poiServiceKey, poiTimeoutMs } = config.sources;
  return poiServiceUrl
    ? new HttpPoiClient({ baseUrl: poiServiceUrl, apiKey: poiServiceKey, timeoutMs: poiTimeoutMs })
    : new NoopPoiClient();
}

export function createSearchOrchestrator(config: AppConfig, overrides: CollaboratorOverrides = {}): SearchOrchestrator {
  const analyzer = new DocumentAnalyzer({
    tagger: overrides.tagger ?? new LLMSemanticTagger(),
    legacy: overrides.legacy ?? new LLMLegacyAnalyzer(),
    policy: config.scoring,
  });

  return new SearchOrchestrator({
    intentParser: overrides.intentParser ?? new LLMIntentParser(),
    classifier: new FollowUpClassifier(
      overrides.interpreter ?? new LLMFollowUpInterpreter(),
      config.contextCache.historyTurns
    ),
    gatherer: new EvidenceGatherer(overrides.documentSource ?? documentSourceFrom(config), config.search),
    analyzer,
    enricher: new PoiEnricher(overrides.poiClient ?? poiClientFrom(config)),
    searchPolicy: config.search,
    scoringPolicy: config.scoring,
  });
}
