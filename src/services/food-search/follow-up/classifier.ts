// ═══════════════════════════════════════════════════════════════════════════════
// FOLLOW-UP CLASSIFIER — Rules First, Semantic Interpreter Second
// ═══════════════════════════════════════════════════════════════════════════════
//
// Tier 1: ordered patterns (exclude, category, location, expand, detail,
//         confirm), then the short-input shop-name rule. Pure and cheap.
// Tier 2: only when nothing matched, the interpreter reads the turn against
//         the current shop list. It may ask for a fresh search itself.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../../observability/logging/index.js';
import { loadCategoryTable } from '../categories.js';
import { normalizeShopName } from '../scoring/engine.js';
import type { FollowUpAction } from '../types.js';
import type { FollowUpInterpreter } from './llm-interpreter.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CONTEXT VIEW
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * What classification reads from a conversation. ConversationContext
 * satisfies it.
 */
export interface ClassifierContext {
  readonly turnCount: number;
  shopNames(): string[];
  recentMessages(count: number): readonly { readonly role: string; readonly content: string }[];
}

// ─────────────────────────────────────────────────────────────────────────────────
// RULES
// ─────────────────────────────────────────────────────────────────────────────────

type TargetedType = 'exclude_filter' | 'category_filter' | 'location_filter' | 'detail';

interface TargetRule {
  readonly type: TargetedType;
  readonly pattern: RegExp;
  /** Extra check on the captured target */
  readonly accept?: (target: string, context: ClassifierContext) => boolean;
}

interface PlainRule {
  readonly type: 'expand' | 'confirm';
  readonly pattern: RegExp;
}

type Rule = TargetRule | PlainRule;

function isKnownCategory(target: string): boolean {
  const table = loadCategoryTable();
  const key = target.trim().toLowerCase();
  return key in table || target.trim() in table;
}

/**
 * Conversational phrasings ("don't want ...") only exclude a shop the
 * conversation actually holds; "I don't want to go far" is not a shop.
 */
function isHeldShop(target: string, context: ClassifierContext): boolean {
  const key = normalizeShopName(target);
  if (key.length < 2) return false;
  return context.shopNames().some(name => {
    const candidate = normalizeShopName(name);
    return candidate.includes(key) || key.includes(candidate);
  });
}

/**
 * Order is the tie-break: the first matching rule wins.
 */
export const FOLLOW_UP_RULES: readonly Rule[] = [
  // exclude
  { type: 'exclude_filter', pattern: /^(?:please\s+)?(?:exclude|remove|drop|skip|hide|ban)\s+(?:the\s+)?(.+?)[.!]*$/i },
  {
    type: 'exclude_filter',
    pattern: /\b(?:not interested in|don'?t want|do not want|no more)\s+(?:the\s+)?(.+?)[.!]*$/i,
    accept: isHeldShop,
  },
  { type: 'exclude_filter', pattern: /(?:排除|去掉|删掉)(.+?)(?:了|吧)?$/ },
  { type: 'exclude_filter', pattern: /(?:不要|不想去)(.+?)(?:了|吧)?$/, accept: isHeldShop },

  // category
  {
    type: 'category_filter',
    pattern: /\b(?:only|just)\s+(?:show\s+(?:me\s+)?)?(?:the\s+)?(.+?)\s+(?:places|ones|shops|restaurants|spots|options)\b(?!\s+in\b)/i,
  },
  { type: 'category_filter', pattern: /\b(?:craving|in the mood for|feel like(?: having| eating)?)\s+(?:some\s+)?(.+?)[.?!]*$/i },
  { type: 'category_filter', pattern: /^(?:how|what)\s+about\s+(?:some\s+)?(.+?)[.?!]*$/i, accept: isKnownCategory },
  { type: 'category_filter', pattern: /(?:只要|只看|换成|想吃)(.+?)(?:的|类)?(?:吧|呢)?$/ },

  // location
  { type: 'location_filter', pattern: /\b(?:near|around|close to|nearby)\s+(?:the\s+)?(.+?)[.?!]*$/i },
  { type: 'location_filter', pattern: /\b(?:only|just)\s+(?:the\s+)?(?:ones|places|shops)\s+in\s+(?:the\s+)?(.+?)[.?!]*$/i },
  { type: 'location_filter', pattern: /(?:在|靠近)(.+?)(?:附近|那边|周边)(?:的)?(?:店|吗|呢)?$/ },

  // expand
  {
    type: 'expand',
    pattern: /^(?:any|show(?:\s+me)?|find|give\s+me|got)?\s*(?:some\s+)?more(?:\s+(?:places|options|shops|restaurants|results|please))?[.?!]*$/i,
  },
  { type: 'expand', pattern: /\b(?:anything else|any others|keep (?:looking|searching)|search (?:again|more)|not enough|find (?:some )?more)\b/i },
  { type: 'expand', pattern: /(?:还有吗|还有别的|还有其他|多找(?:几家|一些)|继续(?:找|搜)|再来(?:几个|一些)|不够)/ },

  // detail
  {
    type: 'detail',
    pattern: /^(?:how\s+is|how's|tell\s+me\s+(?:more\s+)?about|where\s+is|where's|details?\s+(?:on|for|about)|more\s+about|what\s+about)\s+(?:the\s+)?(.+?)[.?!]*$/i,
  },
  { type: 'detail', pattern: /^is\s+(.+?)\s+(?:any\s+good|worth\s+it|good)[.?!]*$/i },
  { type: 'detail', pattern: /^(.+?)(?:怎么样|好不好|在哪|地址|推荐菜|什么菜)/ },
  { type: 'detail', pattern: /(?:介绍一下|详细说说)(.+)$/ },

  // confirm
  {
    type: 'confirm',
    pattern: /\b(?:pick one|choose for me|you pick|you choose|decide for me|which one should i (?:go to|pick|choose)|just pick|go with that one|that one it is)\b/i,
  },
  { type: 'confirm', pattern: /(?:就(?:这个|这家|它)了|帮我选|推荐一家|推荐哪家|去哪家)/ },
];

const SHORT_INPUT_LENGTH = 20;

function cleanTarget(raw: string): string {
  return raw.trim().replace(/^["'“‘]|["'”’]$/g, '').trim();
}

function toAction(rule: Rule, match: RegExpExecArray, context: ClassifierContext): FollowUpAction | null {
  switch (rule.type) {
    case 'expand':
      return { type: 'expand' };
    case 'confirm':
      return { type: 'confirm' };
    case 'exclude_filter':
    case 'category_filter':
    case 'location_filter':
    case 'detail': {
      const target = cleanTarget(match[1] ?? '');
      if (!target) return null;
      if ('accept' in rule && rule.accept && !rule.accept(target, context)) return null;
      return { type: rule.type, target };
    }
  }
}

/**
 * Tier 1 only. Deterministic; null means "ask the interpreter".
 */
export function classifyByRules(text: string, context: ClassifierContext): FollowUpAction | null {
  if (context.turnCount === 0) return { type: 'new_search' };

  const input = text.trim();
  for (const rule of FOLLOW_UP_RULES) {
    const match = rule.pattern.exec(input);
    if (!match) continue;
    const action = toAction(rule, match, context);
    if (action) return action;
  }

  if (input.length < SHORT_INPUT_LENGTH) {
    const key = normalizeShopName(input);
    const shop = context.shopNames().find(name => {
      const candidate = normalizeShopName(name);
      return key.includes(candidate) || (key.length >= 2 && candidate.includes(key));
    });
    if (shop) return { type: 'detail', target: shop };
  }

  return null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CLASSIFIER
// ─────────────────────────────────────────────────────────────────────────────────

const logger = getLogger({ component: 'follow-up-classifier' });

export class FollowUpClassifier {
  constructor(
    private readonly interpreter: FollowUpInterpreter,
    private readonly historyTurns: number = 5
  ) {}

  async classify(text: string, context: ClassifierContext): Promise<FollowUpAction> {
    const ruled = classifyByRules(text, context);
    if (ruled) return ruled;

    const shops = context.shopNames();
    const result = await this.interpreter.interpret({
      text,
      shops,
      history: context.recentMessages(this.historyTurns),
    });

    if (!result.ok) {
      logger.warn('Follow-up interpretation failed, keeping current list', { code: result.error.code });
      return {
        type: 'interpreted',
        shops: [],
        response: 'Here is the current list again.',
        degraded: true,
      };
    }

    if (result.value.newSearch) return { type: 'new_search' };

    return {
      type: 'interpreted',
      shops: result.value.shops,
      response: result.value.response,
      degraded: false,
    };
  }
}
