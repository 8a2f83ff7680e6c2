// ═══════════════════════════════════════════════════════════════════════════════
// FOLLOW-UP CLASSIFIER TESTS — Rule Tier, Interpreter Tier
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { FollowUpClassifier, classifyByRules, type ClassifierContext } from '../follow-up/classifier.js';
import { LLMFollowUpInterpreter } from '../follow-up/llm-interpreter.js';
import { scriptedCompleter } from './fixtures.js';

function conversation(turnCount = 1): ClassifierContext {
  const messages = [
    { role: 'user', content: 'noodles in Alpha City' },
    { role: 'assistant', content: 'Found 3 places for noodles in Alpha City.' },
  ];
  return {
    turnCount,
    shopNames: () => ['Old Wang', 'Noodle House', 'Glow Cafe'],
    recentMessages: count => messages.slice(-count),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// RULE TIER
// ─────────────────────────────────────────────────────────────────────────────────

describe('classifyByRules', () => {
  const cases: [string, unknown][] = [
    ['exclude Glow Cafe', { type: 'exclude_filter', target: 'Glow Cafe' }],
    ["I don't want the Noodle House.", { type: 'exclude_filter', target: 'Noodle House' }],
    ['不要Glow Cafe了', { type: 'exclude_filter', target: 'Glow Cafe' }],
    ['去掉老王', { type: 'exclude_filter', target: '老王' }],
    ['just show me noodles places', { type: 'category_filter', target: 'noodles' }],
    ['craving dumplings!', { type: 'category_filter', target: 'dumplings' }],
    ['what about hotpot', { type: 'category_filter', target: 'hotpot' }],
    ['anything near the harbour?', { type: 'location_filter', target: 'harbour' }],
    ['only the ones in Harbour District', { type: 'location_filter', target: 'Harbour District' }],
    ['more', { type: 'expand' }],
    ['show me more places', { type: 'expand' }],
    ['还有吗', { type: 'expand' }],
    ['tell me about Old Wang', { type: 'detail', target: 'Old Wang' }],
    ['what about Old Wang?', { type: 'detail', target: 'Old Wang' }],
    ['is Glow Cafe any good?', { type: 'detail', target: 'Glow Cafe' }],
    ['老王怎么样', { type: 'detail', target: '老王' }],
    ['you pick', { type: 'confirm' }],
    ['帮我选一家', { type: 'confirm' }],
    ['glow', { type: 'detail', target: 'Glow Cafe' }],
  ];

  it.each(cases)('should classify %j', (text, expected) => {
    expect(classifyByRules(text, conversation())).toEqual(expected);
  });

  it('should treat the first turn as a new search', () => {
    expect(classifyByRules('exclude Glow Cafe', conversation(0))).toEqual({ type: 'new_search' });
  });

  it('should trim quotes from targets', () => {
    expect(classifyByRules('remove "Glow Cafe"', conversation())).toEqual({
      type: 'exclude_filter',
      target: 'Glow Cafe',
    });
  });

  it.each(["I don't want to go far", 'no more please', '不要太远'])(
    'should not read %j as excluding a shop',
    text => {
      expect(classifyByRules(text, conversation())).toBeNull();
    }
  );

  it('should leave unmatched input to the interpreter', () => {
    expect(classifyByRules('which of these is the cheapest', conversation())).toBeNull();
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CLASSIFIER
// ─────────────────────────────────────────────────────────────────────────────────

describe('FollowUpClassifier', () => {
  it('should not call the interpreter when a rule matches', async () => {
    const completer = scriptedCompleter(['{}']);
    const classifier = new FollowUpClassifier(new LLMFollowUpInterpreter({ complete: completer.complete }));

    const action = await classifier.classify('more', conversation());

    expect(action).toEqual({ type: 'expand' });
    expect(completer.requests).toHaveLength(0);
  });

  it('should pass shops and history to the interpreter', async () => {
    const completer = scriptedCompleter([
      '{"new_search":false,"shops":["Old Wang"],"response":"Old Wang is the cheapest."}',
    ]);
    const classifier = new FollowUpClassifier(new LLMFollowUpInterpreter({ complete: completer.complete }), 1);

    const action = await classifier.classify('which of these is the cheapest', conversation());

    expect(action).toEqual({
      type: 'interpreted',
      shops: ['Old Wang'],
      response: 'Old Wang is the cheapest.',
      degraded: false,
    });
    expect(completer.requests[0]?.messages[1]?.content).toBe(
      'Current shops: Old Wang, Noodle House, Glow Cafe\n\n' +
        'Conversation:\nassistant: Found 3 places for noodles in Alpha City.\n\n' +
        'New message: which of these is the cheapest'
    );
  });

  it('should honour the interpreter asking for a fresh search', async () => {
    const completer = scriptedCompleter(['{"new_search":true,"shops":[],"response":""}']);
    const classifier = new FollowUpClassifier(new LLMFollowUpInterpreter({ complete: completer.complete }));

    const action = await classifier.classify('lets try somewhere in Beta Town instead', conversation());

    expect(action).toEqual({ type: 'new_search' });
  });

  it('should keep the current list when the interpreter fails', async () => {
    const classifier = new FollowUpClassifier(
      new LLMFollowUpInterpreter({ complete: scriptedCompleter(['LLM_TIMEOUT']).complete })
    );

    const action = await classifier.classify('which of these is the cheapest', conversation());

    expect(action).toEqual({
      type: 'interpreted',
      shops: [],
      response: 'Here is the current list again.',
      degraded: true,
    });
  });

  it('should treat an unparseable reply as a failure', async () => {
    const classifier = new FollowUpClassifier(
      new LLMFollowUpInterpreter({ complete: scriptedCompleter(['no idea']).complete })
    );

    const action = await classifier.classify('which of these is the cheapest', conversation());

    expect(action.type === 'interpreted' && action.degraded).toBe(true);
  });
});
