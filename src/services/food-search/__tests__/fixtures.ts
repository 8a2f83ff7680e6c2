// ═══════════════════════════════════════════════════════════════════════════════
// TEST FIXTURES — In-Process Collaborators for Food Search Tests
// ═══════════════════════════════════════════════════════════════════════════════

import { appError, err, ok, type AsyncAppResult } from '../../../types/result.js';
import type { ChatCompleter, ChatRequest, LLMErrorCode } from '../../llm/client.js';
import type { PoiClient, PoiRecord, PoiErrorCode } from '../poi/enricher.js';
import type { DocumentSearchOptions, DocumentSource, SourceErrorCode } from '../sources/document-source.js';
import type { LegacyAnalyzer, LegacyErrorCode } from '../tagging/legacy-analyzer.js';
import type { SemanticTagger, TaggableUnit, TaggerErrorCode } from '../tagging/semantic-tagger.js';
import type {
  RawComment,
  RestaurantRecommendation,
  SearchIntent,
  SemanticTag,
  ShopVerdict,
  SourceDocument,
} from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// BUILDERS
// ─────────────────────────────────────────────────────────────────────────────────

export function doc(id: string, title: string, comments: RawComment[] = [], text = ''): SourceDocument {
  return { id, title, text, comments };
}

export function intent(overrides: Partial<SearchIntent> = {}): SearchIntent {
  return { location: 'Alpha City', requirements: [], excludeKeywords: [], ...overrides };
}

export function recommendation(
  name: string,
  overrides: Partial<RestaurantRecommendation> = {},
  verdict: ShopVerdict = 'likely_genuine'
): RestaurantRecommendation {
  const confidence = overrides.confidence ?? 0.75;
  return {
    name,
    location: 'Alpha City',
    features: [],
    sourceDocumentIds: ['d1', 'd2'],
    confidence,
    classification: { verdict, confidence, reasons: [], hasLocalSignal: false },
    isRecommended: true,
    ...overrides,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// DOCUMENT SOURCE
// ─────────────────────────────────────────────────────────────────────────────────

export type FakeResponse = SourceDocument[] | 'fail' | 'hang';

export class FakeDocumentSource implements DocumentSource {
  readonly calls: string[] = [];

  constructor(
    private readonly responses: Record<string, FakeResponse> = {},
    private readonly fallback: SourceDocument[] = []
  ) {}

  async search(query: string, options: DocumentSearchOptions): AsyncAppResult<SourceDocument[], SourceErrorCode> {
    this.calls.push(query);
    const response = this.responses[query];

    if (response === 'fail') return err(appError('SOURCE_FAILED', 'source down'));
    if (response === 'hang') return new Promise(() => undefined);
    return ok((response ?? this.fallback).slice(0, options.limit));
  }

  async fetch(documentId: string): AsyncAppResult<SourceDocument | null, SourceErrorCode> {
    const all = [...Object.values(this.responses), this.fallback].flatMap(r => (Array.isArray(r) ? r : []));
    return ok(all.find(d => d.id === documentId) ?? null);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// TAGGERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Labels comments from plain keywords and finds known shop names.
 *
 *   "grew up here"  → strong     "regular"    → medium
 *   "actually"      → correction "terrible"   → negative
 *   "love"/"great"  → positive
 */
export class KeywordTagger implements SemanticTagger {
  readonly batches: number[] = [];

  constructor(private readonly shops: readonly string[]) {}

  async tag(units: readonly TaggableUnit[]): AsyncAppResult<SemanticTag[], TaggerErrorCode> {
    this.batches.push(units.length);
    return ok(
      units.map((unit): SemanticTag => {
        const text = unit.text.toLowerCase();
        return {
          unitId: unit.id,
          identity: text.includes('grew up here') ? 'strong' : text.includes('regular') ? 'medium' : 'none',
          sentiment: text.includes('terrible') ? 'negative' : text.includes('love') || text.includes('great') ? 'positive' : 'neutral',
          isCorrection: text.includes('actually'),
          mentionedShops: this.shops.filter(shop => text.includes(shop.toLowerCase())),
        };
      })
    );
  }
}

export class FailingTagger implements SemanticTagger {
  calls = 0;

  async tag(): AsyncAppResult<SemanticTag[], TaggerErrorCode> {
    this.calls++;
    return err(appError('TAGGER_FAILED', 'tagger down'));
  }
}

export class FakeLegacyAnalyzer implements LegacyAnalyzer {
  readonly analysed: string[] = [];

  constructor(private readonly byDocument: Record<string, RestaurantRecommendation[] | 'fail'> = {}) {}

  async analyze(document: SourceDocument): AsyncAppResult<RestaurantRecommendation[], LegacyErrorCode> {
    this.analysed.push(document.id);
    const response = this.byDocument[document.id];
    if (response === 'fail') return err(appError('LEGACY_FAILED', 'legacy down'));
    return ok(response ?? []);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CHAT COMPLETER
// ─────────────────────────────────────────────────────────────────────────────────

export interface ScriptedCompleter {
  readonly complete: ChatCompleter;
  readonly requests: ChatRequest[];
}

/**
 * Answers each request with the next scripted reply; an LLMErrorCode entry
 * answers with that error.
 */
export function scriptedCompleter(replies: readonly (string | LLMErrorCode)[]): ScriptedCompleter {
  const requests: ChatRequest[] = [];
  const errorCodes: readonly string[] = ['LLM_UNAVAILABLE', 'LLM_TIMEOUT', 'LLM_ERROR', 'LLM_EMPTY'];
  let index = 0;

  const complete: ChatCompleter = async request => {
    requests.push(request);
    const reply = replies[Math.min(index++, replies.length - 1)] ?? 'LLM_EMPTY';
    if (isErrorCode(reply)) return err(appError(reply, `scripted ${reply}`));
    return ok(reply);
  };

  function isErrorCode(value: string): value is LLMErrorCode {
    return errorCodes.includes(value);
  }

  return { complete, requests };
}

// ─────────────────────────────────────────────────────────────────────────────────
// POI CLIENT
// ─────────────────────────────────────────────────────────────────────────────────

export class FakePoiClient implements PoiClient {
  readonly lookups: string[] = [];

  constructor(private readonly records: Record<string, PoiRecord | 'fail'> = {}) {}

  async lookup(name: string): AsyncAppResult<PoiRecord | null, PoiErrorCode> {
    this.lookups.push(name);
    const record = this.records[name];
    if (record === 'fail') return err(appError('POI_FAILED', 'poi down'));
    return ok(record ?? null);
  }
}
