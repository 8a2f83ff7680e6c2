// ═══════════════════════════════════════════════════════════════════════════════
// SEMANTIC TAGGER ADAPTER — Units In, Validated Tags Out
// ═══════════════════════════════════════════════════════════════════════════════
//
// The collaborator labels each comment (identity strength, sentiment,
// correction flag, shops mentioned). Its answer is untrusted: unknown labels
// degrade to {none, neutral}, missing ids get an empty tag. Only a response
// that is not a tag list at all counts as a failure.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { loadConfig } from '../../../config/index.js';
import { getLogger } from '../../../observability/logging/index.js';
import { appError, err, ok, type AppResult, type AsyncAppResult } from '../../../types/result.js';
import { completeChat, extractJson, type ChatCompleter } from '../../llm/client.js';
import {
  IDENTITY_STRENGTHS,
  SENTIMENTS,
  type IdentityStrength,
  type NormalizedCommentUnit,
  type SemanticTag,
  type Sentiment,
} from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CONTRACT
// ─────────────────────────────────────────────────────────────────────────────────

export type TaggerErrorCode = 'TAGGER_UNAVAILABLE' | 'TAGGER_FAILED' | 'TAGGER_MALFORMED';

export type TaggableUnit = Pick<NormalizedCommentUnit, 'id' | 'text'>;

export interface SemanticTagger {
  /** One tag per input id, in input order */
  tag(units: readonly TaggableUnit[], context?: TaggingContext): AsyncAppResult<SemanticTag[], TaggerErrorCode>;
}

export interface TaggingContext {
  readonly documentTitle?: string;
  readonly location?: string;
}

const logger = getLogger({ component: 'semantic-tagger' });

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

const RawTagSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  identity: z.unknown().optional(),
  sentiment: z.unknown().optional(),
  is_correction: z.unknown().optional(),
  mentioned_shops: z.unknown().optional(),
});

export function emptyTag(unitId: string): SemanticTag {
  return { unitId, identity: 'none', sentiment: 'neutral', isCorrection: false, mentionedShops: [] };
}

function normalizeLabel<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  if (typeof value !== 'string') return fallback;
  const label = value.trim().toLowerCase();
  return allowed.find(candidate => candidate === label) ?? fallback;
}

function normalizeShops(value: unknown): string[] {
  const names = Array.isArray(value) ? value : typeof value === 'string' ? [value] : [];
  return names
    .filter((name): name is string => typeof name === 'string')
    .map(name => name.trim())
    .filter(name => name.length > 0);
}

const TagListSchema = z.union([
  z.array(z.unknown()),
  z.object({ tags: z.array(z.unknown()) }).transform(value => value.tags),
  z.object({ comments: z.array(z.unknown()) }).transform(value => value.comments),
  z.object({ results: z.array(z.unknown()) }).transform(value => value.results),
]);

/**
 * Turn a raw collaborator answer into exactly one tag per unit.
 */
export function validateTags(
  raw: unknown,
  units: readonly TaggableUnit[]
): AppResult<SemanticTag[], 'TAGGER_MALFORMED'> {
  const parsedList = TagListSchema.safeParse(raw);
  if (!parsedList.success) {
    return err(appError('TAGGER_MALFORMED', 'Tagger response is not a tag list'));
  }
  const list = parsedList.data;

  const byId = new Map<string, SemanticTag>();
  for (const entry of list) {
    const parsed = RawTagSchema.safeParse(entry);
    if (!parsed.success) continue;

    const { id, identity, sentiment, is_correction: isCorrection, mentioned_shops: shops } = parsed.data;
    if (byId.has(id)) continue;

    byId.set(id, {
      unitId: id,
      identity: normalizeLabel<IdentityStrength>(identity, IDENTITY_STRENGTHS, 'none'),
      sentiment: normalizeLabel<Sentiment>(sentiment, SENTIMENTS, 'neutral'),
      isCorrection: isCorrection === true || isCorrection === 'true',
      mentionedShops: normalizeShops(shops),
    });
  }

  return ok(units.map(unit => byId.get(unit.id) ?? emptyTag(unit.id)));
}

// ─────────────────────────────────────────────────────────────────────────────────
// PROMPT
// ─────────────────────────────────────────────────────────────────────────────────

const TAGGER_SYSTEM_PROMPT = `You label restaurant comments from a social platform. For each comment decide:

- identity: how strongly the author reads as a genuine local resident
  "strong"  - says they live here, grew up here, eat here for years
  "medium"  - knows the area well, regular customer, local slang
  "none"    - tourist, visitor, or no signal
- sentiment: "positive", "negative" or "neutral" about the food/shop
- is_correction: true when the comment corrects or disputes a claim (wrong address, closed down, "the real one is...")
- mentioned_shops: exact shop names mentioned, as written; [] when none

Do not score, rank or count anything. Return JSON only, no markdown:
[{"id":"...","identity":"strong|medium|none","sentiment":"positive|negative|neutral","is_correction":false,"mentioned_shops":["..."]}]`;

function buildUserPrompt(units: readonly TaggableUnit[], context?: TaggingContext): string {
  const header: string[] = [];
  if (context?.location) header.push(`Area: ${context.location}`);
  if (context?.documentTitle) header.push(`Post title: ${context.documentTitle}`);

  const lines = units.map(unit => `[${unit.id}] ${unit.text}`);
  return [...header, 'Comments:', ...lines].join('\n');
}

// ─────────────────────────────────────────────────────────────────────────────────
// LLM-BACKED TAGGER
// ─────────────────────────────────────────────────────────────────────────────────

export interface LLMSemanticTaggerOptions {
  readonly complete?: ChatCompleter;
  readonly batchSize?: number;
  readonly timeoutMs?: number;
}

export class LLMSemanticTagger implements SemanticTagger {
  private readonly complete: ChatCompleter;
  private readonly batchSize: number;
  private readonly timeoutMs: number;

  constructor(options: LLMSemanticTaggerOptions = {}) {
    const llm = loadConfig().llm;
    this.complete = options.complete ?? completeChat;
    this.batchSize = Math.max(1, options.batchSize ?? llm.taggingBatchSize);
    this.timeoutMs = options.timeoutMs ?? llm.taggingTimeoutMs;
  }

  async tag(
    units: readonly TaggableUnit[],
    context?: TaggingContext
  ): AsyncAppResult<SemanticTag[], TaggerErrorCode> {
    const tags: SemanticTag[] = [];

    for (let offset = 0; offset < units.length; offset += this.batchSize) {
      const batch = units.slice(offset, offset + this.batchSize);
      const result = await this.tagBatch(batch, context);
      if (!result.ok) return result;
      tags.push(...result.value);
    }

    return ok(tags);
  }

  private async tagBatch(
    batch: readonly TaggableUnit[],
    context?: TaggingContext
  ): AsyncAppResult<SemanticTag[], TaggerErrorCode> {
    const completion = await this.complete({
      purpose: 'comment-tagging',
      maxTokens: 200 + batch.length * 60,
      timeoutMs: this.timeoutMs,
      messages: [
        { role: 'system', content: TAGGER_SYSTEM_PROMPT },
        { role: 'user', content: buildUserPrompt(batch, context) },
      ],
    });

    if (!completion.ok) {
      const code: TaggerErrorCode = completion.error.code === 'LLM_UNAVAILABLE' ? 'TAGGER_UNAVAILABLE' : 'TAGGER_FAILED';
      return err(appError(code, completion.error.message, { cause: completion.error.cause }));
    }

    const validated = validateTags(extractJson(completion.value), batch);
    if (!validated.ok) {
      logger.warn('Tagger returned a non-conforming response', { units: batch.length });
    }
    return validated;
  }
}
