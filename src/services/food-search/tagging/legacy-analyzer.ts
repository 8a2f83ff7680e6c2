// ═══════════════════════════════════════════════════════════════════════════════
// LEGACY ANALYZER — Single-Pass Document Judgement
// ═══════════════════════════════════════════════════════════════════════════════
//
// Degraded path used when comment tagging fails for a document: the
// collaborator reads the whole post and returns restaurants with a verdict.
// Confidence comes from the collaborator here, clamped to [0, 1].
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { loadConfig } from '../../../config/index.js';
import { appError, err, ok, type AsyncAppResult } from '../../../types/result.js';
import { completeChat, extractJson, type ChatCompleter } from '../../llm/client.js';
import { cleanShopName } from '../scoring/engine.js';
import type {
  RestaurantRecommendation,
  SearchIntent,
  ShopVerdict,
  SourceDocument,
} from '../types.js';

export type LegacyErrorCode = 'LEGACY_UNAVAILABLE' | 'LEGACY_FAILED' | 'LEGACY_MALFORMED';

export interface LegacyAnalyzer {
  analyze(document: SourceDocument, intent: SearchIntent): AsyncAppResult<RestaurantRecommendation[], LegacyErrorCode>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESPONSE SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

const VERDICT_ALIASES: Record<string, ShopVerdict> = {
  genuine: 'genuine',
  definitely_local: 'genuine',
  likely_genuine: 'likely_genuine',
  likely_local: 'likely_genuine',
  unknown: 'unknown',
  likely_promoted: 'likely_promoted',
  likely_wanghong: 'likely_promoted',
  promoted: 'promoted',
  definitely_wanghong: 'promoted',
};

const LegacyRestaurantSchema = z.object({
  name: z.string().trim().min(1),
  location: z.string().optional().catch(undefined),
  features: z.array(z.string()).catch([]),
  verdict: z.string().catch('unknown'),
  confidence: z.number().catch(0.5),
  reasons: z.array(z.string()).catch([]),
  has_local_mentions: z.boolean().catch(false),
});

const LegacyResponseSchema = z.object({
  restaurants: z.array(z.unknown()),
});

type LegacyRestaurant = z.infer<typeof LegacyRestaurantSchema>;

function toRecommendation(raw: LegacyRestaurant, documentId: string, intent: SearchIntent): RestaurantRecommendation {
  const verdict = VERDICT_ALIASES[raw.verdict.trim().toLowerCase()] ?? 'unknown';
  const confidence = Math.min(1, Math.max(0, raw.confidence));
  const promoted = verdict === 'promoted' || verdict === 'likely_promoted';

  return {
    name: cleanShopName(raw.name),
    location: raw.location ?? intent.location,
    features: raw.features,
    sourceDocumentIds: [documentId],
    confidence,
    classification: {
      verdict,
      confidence,
      reasons: raw.reasons,
      hasLocalSignal: raw.has_local_mentions,
    },
    isRecommended: !promoted,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PROMPT
// ─────────────────────────────────────────────────────────────────────────────────

const LEGACY_SYSTEM_PROMPT = `You read one social-media post about food and its comments, and list the restaurants it recommends.
For each restaurant judge whether it is a genuine local favourite or a promoted/influencer venue.

Return JSON only, no markdown:
{"restaurants":[{"name":"...","location":"...","features":["..."],"verdict":"genuine|likely_genuine|unknown|likely_promoted|promoted","confidence":0.0,"reasons":["..."],"has_local_mentions":false}]}`;

function buildPrompt(document: SourceDocument, intent: SearchIntent): string {
  const comments = document.comments
    .slice(0, 20)
    .map(comment => `- ${comment.text}${comment.likes !== undefined ? ` [${comment.likes} likes]` : ''}`);

  return [
    `Area: ${intent.location}`,
    `Title: ${document.title}`,
    `Post: ${document.text.slice(0, 2000)}`,
    'Comments:',
    ...comments,
    `Skip restaurants matching: ${intent.excludeKeywords.join(', ') || '(none)'}`,
  ].join('\n');
}

// ─────────────────────────────────────────────────────────────────────────────────
// LLM-BACKED ANALYZER
// ─────────────────────────────────────────────────────────────────────────────────

export class LLMLegacyAnalyzer implements LegacyAnalyzer {
  private readonly complete: ChatCompleter;
  private readonly timeoutMs: number;

  constructor(options: { complete?: ChatCompleter; timeoutMs?: number } = {}) {
    this.complete = options.complete ?? completeChat;
    this.timeoutMs = options.timeoutMs ?? loadConfig().llm.analyzerTimeoutMs;
  }

  async analyze(
    document: SourceDocument,
    intent: SearchIntent
  ): AsyncAppResult<RestaurantRecommendation[], LegacyErrorCode> {
    const completion = await this.complete({
      purpose: 'legacy-analysis',
      maxTokens: 1500,
      timeoutMs: this.timeoutMs,
      messages: [
        { role: 'system', content: LEGACY_SYSTEM_PROMPT },
        { role: 'user', content: buildPrompt(document, intent) },
      ],
    });

    if (!completion.ok) {
      const code: LegacyErrorCode = completion.error.code === 'LLM_UNAVAILABLE' ? 'LEGACY_UNAVAILABLE' : 'LEGACY_FAILED';
      return err(appError(code, completion.error.message, { cause: completion.error.cause }));
    }

    const parsed = LegacyResponseSchema.safeParse(extractJson(completion.value));
    if (!parsed.success) {
      return err(appError('LEGACY_MALFORMED', 'Legacy analysis response has no restaurant list'));
    }

    const restaurants: RestaurantRecommendation[] = [];
    for (const entry of parsed.data.restaurants) {
      const restaurant = LegacyRestaurantSchema.safeParse(entry);
      if (restaurant.success) {
        restaurants.push(toRecommendation(restaurant.data, document.id, intent));
      }
    }

    return ok(restaurants);
  }
}
