// ═══════════════════════════════════════════════════════════════════════════════
// INTENT PARSER TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  CLARIFY_LOCATION_QUESTIONS,
  LLMIntentParser,
  parseIntentByRules,
  resolveDraft,
} from '../intent/intent-parser.js';
import { intent, scriptedCompleter } from './fixtures.js';

// ─────────────────────────────────────────────────────────────────────────────────
// PATTERN PARSE
// ─────────────────────────────────────────────────────────────────────────────────

describe('parseIntentByRules', () => {
  it('should read food and location', () => {
    expect(parseIntentByRules('noodles in Alpha City')).toEqual({
      location: 'Alpha City',
      foodType: 'noodles',
      requirements: [],
      excludeKeywords: [],
    });
  });

  it('should pull requirements and exclusions out of the request', () => {
    expect(parseIntentByRules('find me cheap noodles in Alpha City, no chains')).toEqual({
      location: 'Alpha City',
      foodType: 'noodles',
      requirements: ['cheap'],
      excludeKeywords: ['chains'],
    });
  });

  it('should read a location-only request', () => {
    const draft = parseIntentByRules('where to eat in Beta Town');

    expect(draft.location).toBe('Beta Town');
    expect(draft.foodType).toBeUndefined();
  });

  it('should treat generic food words as no food type', () => {
    const draft = parseIntentByRules('good food near Harbour');

    expect(draft.location).toBe('Harbour');
    expect(draft.foodType).toBeUndefined();
  });

  it('should read a Chinese request', () => {
    const draft = parseIntentByRules('成都有什么好吃的火锅推荐');

    expect(draft.location).toBe('成都');
    expect(draft.foodType).toBe('火锅');
  });

  it('should leave the location empty when none is given', () => {
    const draft = parseIntentByRules('something spicy');

    expect(draft.location).toBeUndefined();
    expect(draft.requirements).toEqual(['spicy']);
  });
});

describe('resolveDraft', () => {
  const draft = { requirements: ['spicy'], excludeKeywords: [] };

  it('should ask for a location when there is none', () => {
    expect(resolveDraft(draft)).toEqual({ kind: 'clarify', questions: CLARIFY_LOCATION_QUESTIONS });
  });

  it('should inherit the previous location', () => {
    expect(resolveDraft(draft, intent({ foodType: 'noodles' }))).toEqual({
      kind: 'intent',
      intent: { location: 'Alpha City', foodType: undefined, requirements: ['spicy'], excludeKeywords: [] },
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// COLLABORATOR PARSE
// ─────────────────────────────────────────────────────────────────────────────────

describe('LLMIntentParser', () => {
  it('should use the collaborator reading', async () => {
    const completer = scriptedCompleter([
      '{"location":"Alpha City","food_type":null,"requirements":["quiet"],"exclude_keywords":[]}',
    ]);
    const parser = new LLMIntentParser({ complete: completer.complete });

    const result = await parser.parse('somewhere quiet to eat in Alpha City');

    expect(result).toEqual({
      kind: 'intent',
      intent: { location: 'Alpha City', foodType: undefined, requirements: ['quiet'], excludeKeywords: [] },
    });
    expect(completer.requests[0]?.messages[1]?.content).toBe('somewhere quiet to eat in Alpha City');
  });

  it('should fill a missing location from the previous intent', async () => {
    const parser = new LLMIntentParser({
      complete: scriptedCompleter(['{"location":null,"food_type":"dumplings"}']).complete,
    });

    const result = await parser.parse('dumplings instead', intent());

    expect(result).toEqual({
      kind: 'intent',
      intent: { location: 'Alpha City', foodType: 'dumplings', requirements: [], excludeKeywords: [] },
    });
  });

  it('should ask for clarification without any location', async () => {
    const parser = new LLMIntentParser({ complete: scriptedCompleter(['{"location":""}']).complete });

    const result = await parser.parse('something tasty');

    expect(result.kind).toBe('clarify');
  });

  it('should fall back to the pattern parse when the collaborator fails', async () => {
    const parser = new LLMIntentParser({ complete: scriptedCompleter(['LLM_TIMEOUT']).complete });

    const result = await parser.parse('noodles in Alpha City');

    expect(result).toEqual({
      kind: 'intent',
      intent: { location: 'Alpha City', foodType: 'noodles', requirements: [], excludeKeywords: [] },
    });
  });

  it('should fall back to the pattern parse on a malformed reply', async () => {
    const parser = new LLMIntentParser({ complete: scriptedCompleter(['I think you mean noodles']).complete });

    const result = await parser.parse('noodles in Alpha City');

    expect(result.kind === 'intent' && result.intent.foodType).toBe('noodles');
  });

  it('should reject an empty query without calling the collaborator', async () => {
    const completer = scriptedCompleter(['{}']);
    const parser = new LLMIntentParser({ complete: completer.complete });

    const result = await parser.parse('   ');

    expect(result).toEqual({ kind: 'error', message: 'Empty query' });
    expect(completer.requests).toHaveLength(0);
  });
});
