// ═══════════════════════════════════════════════════════════════════════════════
// INTENT PARSER — Free Text → SearchIntent, or a Request for Clarification
// ═══════════════════════════════════════════════════════════════════════════════
//
// The collaborator reads the request first; its JSON is validated with zod.
// When it is unavailable or answers with garbage, a pattern parse takes over.
// A missing location is never an exception: it becomes a clarification.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { loadConfig } from '../../../config/index.js';
import { getLogger } from '../../../observability/logging/index.js';
import { completeChat, extractJson, type ChatCompleter } from '../../llm/client.js';
import type { SearchIntent } from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type IntentParseResult =
  | { readonly kind: 'intent'; readonly intent: SearchIntent }
  | { readonly kind: 'clarify'; readonly questions: readonly string[] }
  | { readonly kind: 'error'; readonly message: string };

export interface IntentParser {
  /**
   * @param previous the session's last intent; its location fills a gap
   */
  parse(text: string, previous?: SearchIntent): Promise<IntentParseResult>;
}

/**
 * Partial reading of a request before the location check.
 */
export interface IntentDraft {
  readonly location?: string;
  readonly foodType?: string;
  readonly requirements: readonly string[];
  readonly excludeKeywords: readonly string[];
}

const logger = getLogger({ component: 'intent-parser' });

export const CLARIFY_LOCATION_QUESTIONS: readonly string[] = [
  'Which city or neighbourhood should I search in?',
  'Any particular kind of food you have in mind?',
];

// ─────────────────────────────────────────────────────────────────────────────────
// PATTERN PARSE
// ─────────────────────────────────────────────────────────────────────────────────

const GENERIC_FOOD = /^(?:food|eats?|eating|places?|restaurants?|somewhere|something|good food|local food|吃的|好吃的|美食)$/i;

const FOOD_IN_LOCATION =
  /^(?:please\s+)?(?:find(?:\s+me)?|show(?:\s+me)?|recommend|suggest|any|looking\s+for|i\s+want|where\s+(?:to|can\s+i)\s+(?:eat|get|find))?\s*(?:some\s+|good\s+|great\s+|the\s+best\s+|authentic\s+|local\s+)*(.+?)\s+(?:in|near|around|at)\s+(.+?)[.?!？。]*$/i;

const LOCATION_ONLY = /^(?:where\s+to\s+eat|what\s+to\s+eat|eating)\s+(?:in|near|around|at)\s+(.+?)[.?!？。]*$/i;

const LOCATION_HAS_FOOD = /^(.{2,12}?)(?:有什么|有啥|哪家|哪里有|附近的?)(?:好吃的|值得吃的)?(.*?)(?:推荐|好吃|吗|呢|店)*[?？。]*$/;

const REQUIREMENT_PATTERN =
  /\b(cheap|budget|affordable|quiet|late[- ]night|open late|spicy|non[- ]spicy|vegetarian|vegan|halal|family[- ]friendly|date night|no queue|private rooms?)\b/gi;

const EXCLUDE_PATTERN = /\b(?:no|without|avoid|not)\s+(chains?|franchises?|tourist traps?|influencer (?:spots|places))\b/gi;

function cleanPhrase(value: string | undefined): string | undefined {
  const cleaned = value
    ?.replace(/\b(?:please|thanks?|thank you)\b/gi, '')
    .replace(/[,，]+$/, '')
    .trim();
  return cleaned ? cleaned : undefined;
}

function stripTrailingQualifiers(location: string): string {
  return location
    .replace(REQUIREMENT_PATTERN, '')
    .replace(EXCLUDE_PATTERN, '')
    .replace(/\b(?:that(?:'s| is| are)?|with|for)\b.*$/i, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function collect(pattern: RegExp, text: string): string[] {
  const found = new Set<string>();
  for (const match of text.matchAll(pattern)) {
    const value = match[1]?.toLowerCase().trim();
    if (value) found.add(value);
  }
  return [...found];
}

/**
 * Pattern-only reading of a request. Used when the collaborator is absent.
 */
export function parseIntentByRules(text: string): IntentDraft {
  const input = text.trim();
  const requirements = collect(REQUIREMENT_PATTERN, input);
  const excludeKeywords = collect(EXCLUDE_PATTERN, input);

  let location: string | undefined;
  let food: string | undefined;

  const locationOnly = LOCATION_ONLY.exec(input);
  const foodInLocation = locationOnly ? null : FOOD_IN_LOCATION.exec(input);
  const chinese = locationOnly || foodInLocation ? null : LOCATION_HAS_FOOD.exec(input);

  if (locationOnly) {
    location = cleanPhrase(locationOnly[1]);
  } else if (foodInLocation) {
    food = cleanPhrase(foodInLocation[1]?.replace(REQUIREMENT_PATTERN, ''));
    location = cleanPhrase(foodInLocation[2]);
  } else if (chinese) {
    location = cleanPhrase(chinese[1]);
    food = cleanPhrase(chinese[2]);
  }

  if (location) location = cleanPhrase(stripTrailingQualifiers(location));
  const foodType = food && !GENERIC_FOOD.test(food) ? food.toLowerCase() : undefined;

  return { location, foodType, requirements, excludeKeywords };
}

/**
 * Turn a draft into a result: a location (own or inherited) makes an intent.
 */
export function resolveDraft(draft: IntentDraft, previous?: SearchIntent): IntentParseResult {
  const location = draft.location ?? previous?.location;
  if (!location) {
    return { kind: 'clarify', questions: CLARIFY_LOCATION_QUESTIONS };
  }

  const intent: SearchIntent = {
    location,
    foodType: draft.foodType,
    requirements: draft.requirements,
    excludeKeywords: draft.excludeKeywords,
  };
  return { kind: 'intent', intent };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COLLABORATOR PARSE
// ─────────────────────────────────────────────────────────────────────────────────

const optionalText = z
  .string()
  .nullish()
  .transform(value => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const IntentResponseSchema = z.object({
  location: optionalText,
  food_type: optionalText,
  requirements: z.array(z.string()).catch([]),
  exclude_keywords: z.array(z.string()).catch([]),
});

const INTENT_SYSTEM_PROMPT = `Extract a restaurant search request.
Return JSON only, no markdown:
{"location":"city or area, null if not stated","food_type":"kind of food, null if any","requirements":["..."],"exclude_keywords":["..."]}`;

export class LLMIntentParser implements IntentParser {
  private readonly complete: ChatCompleter;
  private readonly timeoutMs: number;

  constructor(options: { complete?: ChatCompleter; timeoutMs?: number } = {}) {
    this.complete = options.complete ?? completeChat;
    this.timeoutMs = options.timeoutMs ?? loadConfig().llm.intentTimeoutMs;
  }

  async parse(text: string, previous?: SearchIntent): Promise<IntentParseResult> {
    if (!text.trim()) {
      return { kind: 'error', message: 'Empty query' };
    }

    const completion = await this.complete({
      purpose: 'intent-parse',
      maxTokens: 200,
      timeoutMs: this.timeoutMs,
      messages: [
        { role: 'system', content: INTENT_SYSTEM_PROMPT },
        { role: 'user', content: text },
      ],
    });

    if (completion.ok) {
      const parsed = IntentResponseSchema.safeParse(extractJson(completion.value));
      if (parsed.success) {
        const draft: IntentDraft = {
          location: parsed.data.location,
          foodType: parsed.data.food_type,
          requirements: parsed.data.requirements,
          excludeKeywords: parsed.data.exclude_keywords,
        };
        return resolveDraft(draft, previous);
      }
      logger.warn('Intent response malformed, using pattern parse');
    } else if (completion.error.code !== 'LLM_UNAVAILABLE') {
      logger.warn('Intent collaborator failed, using pattern parse', { code: completion.error.code });
    }

    return resolveDraft(parseIntentByRules(text), previous);
  }
}
