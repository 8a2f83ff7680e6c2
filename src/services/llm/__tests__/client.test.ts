// ═══════════════════════════════════════════════════════════════════════════════
// LLM CLIENT TESTS — Availability and JSON Extraction
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { completeChat, extractJson, isLLMAvailable, resetOpenAIClient } from '../client.js';

describe('completeChat', () => {
  beforeEach(() => {
    resetOpenAIClient();
  });

  it('should report the collaborator as unavailable without a key', async () => {
    const result = await completeChat({
      messages: [{ role: 'user', content: 'hello' }],
      maxTokens: 10,
      timeoutMs: 100,
      purpose: 'test',
    });

    expect(isLLMAvailable()).toBe(false);
    expect(result.ok ? null : result.error.code).toBe('LLM_UNAVAILABLE');
  });
});

describe('extractJson', () => {
  it('should parse a plain reply', () => {
    expect(extractJson(' {"new_search": true} ')).toEqual({ new_search: true });
  });

  it('should parse a fenced reply', () => {
    expect(extractJson('Here you go:\n```json\n[{"id": "a"}]\n```')).toEqual([{ id: 'a' }]);
  });

  it('should find an object inside prose', () => {
    expect(extractJson('Sure. {"shops": ["Old Wang"]} Hope that helps')).toEqual({ shops: ['Old Wang'] });
  });

  it('should give up on text with no JSON', () => {
    expect(extractJson('no idea')).toBeUndefined();
  });
});
