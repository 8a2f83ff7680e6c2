// ═══════════════════════════════════════════════════════════════════════════════
// TAGGING TESTS — Tag Validation, Batching, Legacy Analyzer
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import { LLMLegacyAnalyzer } from '../tagging/legacy-analyzer.js';
import { LLMSemanticTagger, emptyTag, validateTags } from '../tagging/semantic-tagger.js';
import { doc, intent, scriptedCompleter } from './fixtures.js';

const units = [
  { id: 'd1#0', text: 'grew up two streets away' },
  { id: 'd1#1', text: 'came here on holiday' },
];

// ─────────────────────────────────────────────────────────────────────────────────
// validateTags
// ─────────────────────────────────────────────────────────────────────────────────

describe('validateTags', () => {
  it('should map a well-formed list onto the input units', () => {
    const result = validateTags(
      [
        { id: 'd1#0', identity: 'strong', sentiment: 'positive', is_correction: false, mentioned_shops: ['Old Wang'] },
        { id: 'd1#1', identity: 'none', sentiment: 'neutral', is_correction: true, mentioned_shops: [] },
      ],
      units
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual([
      { unitId: 'd1#0', identity: 'strong', sentiment: 'positive', isCorrection: false, mentionedShops: ['Old Wang'] },
      { unitId: 'd1#1', identity: 'none', sentiment: 'neutral', isCorrection: true, mentionedShops: [] },
    ]);
  });

  it('should degrade unknown labels to none and neutral', () => {
    const result = validateTags([{ id: 'd1#0', identity: 'LOCAL-ISH', sentiment: 'ecstatic' }], units);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value[0]).toEqual({
      unitId: 'd1#0',
      identity: 'none',
      sentiment: 'neutral',
      isCorrection: false,
      mentionedShops: [],
    });
  });

  it('should normalise label case and accept a string shop or a numeric id', () => {
    const result = validateTags({ tags: [{ id: 7, identity: ' Medium ', mentioned_shops: ' Noodle Bar ' }] }, [
      { id: '7', text: 'regular here' },
    ]);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value[0]?.identity).toBe('medium');
    expect(result.value[0]?.mentionedShops).toEqual(['Noodle Bar']);
  });

  it('should fill missing ids with an empty tag and ignore unknown ids', () => {
    const result = validateTags([{ id: 'other', identity: 'strong' }], units);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual([emptyTag('d1#0'), emptyTag('d1#1')]);
  });

  it('should keep the first tag for a duplicated id', () => {
    const result = validateTags(
      [
        { id: 'd1#0', identity: 'strong' },
        { id: 'd1#0', identity: 'none' },
      ],
      units
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value[0]?.identity).toBe('strong');
  });

  it('should reject a response that is not a tag list', () => {
    const result = validateTags({ answer: 'sorry' }, units);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('TAGGER_MALFORMED');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// LLMSemanticTagger
// ─────────────────────────────────────────────────────────────────────────────────

describe('LLMSemanticTagger', () => {
  it('should split units into batches and keep input order', async () => {
    const completer = scriptedCompleter([
      '[{"id":"a","identity":"strong"},{"id":"b","sentiment":"negative"}]',
      '```json\n[{"id":"c","is_correction":"true"}]\n```',
    ]);
    const tagger = new LLMSemanticTagger({ complete: completer.complete, batchSize: 2 });

    const result = await tagger.tag([
      { id: 'a', text: 'one' },
      { id: 'b', text: 'two' },
      { id: 'c', text: 'three' },
    ]);

    expect(completer.requests).toHaveLength(2);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map(tag => tag.unitId)).toEqual(['a', 'b', 'c']);
    expect(result.value[0]?.identity).toBe('strong');
    expect(result.value[1]?.sentiment).toBe('negative');
    expect(result.value[2]?.isCorrection).toBe(true);
  });

  it('should include the area and title in the prompt', async () => {
    const completer = scriptedCompleter(['[]']);
    const tagger = new LLMSemanticTagger({ complete: completer.complete });

    await tagger.tag([{ id: 'a', text: 'one' }], { location: 'Alpha City', documentTitle: 'Best noodles' });

    const userMessage = completer.requests[0]?.messages[1]?.content;
    expect(userMessage).toBe('Area: Alpha City\nPost title: Best noodles\nComments:\n[a] one');
  });

  it('should map an unavailable collaborator to TAGGER_UNAVAILABLE', async () => {
    const tagger = new LLMSemanticTagger({ complete: scriptedCompleter(['LLM_UNAVAILABLE']).complete });

    const result = await tagger.tag(units);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('TAGGER_UNAVAILABLE');
  });

  it('should map other collaborator errors to TAGGER_FAILED', async () => {
    const tagger = new LLMSemanticTagger({ complete: scriptedCompleter(['LLM_TIMEOUT']).complete });

    const result = await tagger.tag(units);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('TAGGER_FAILED');
  });

  it('should fail the whole call when one batch is malformed', async () => {
    const completer = scriptedCompleter(['[{"id":"a"}]', 'no json here']);
    const tagger = new LLMSemanticTagger({ complete: completer.complete, batchSize: 1 });

    const result = await tagger.tag([
      { id: 'a', text: 'one' },
      { id: 'b', text: 'two' },
    ]);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('TAGGER_MALFORMED');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// LLMLegacyAnalyzer
// ─────────────────────────────────────────────────────────────────────────────────

describe('LLMLegacyAnalyzer', () => {
  const post = doc('d9', 'Weekend eats', [{ text: 'the dumplings are great', likes: 4 }], 'A long post');

  it('should map verdict aliases and clamp confidence', async () => {
    const reply = JSON.stringify({
      restaurants: [
        { name: '  Old   Wang ', verdict: 'definitely_local', confidence: 1.4, has_local_mentions: true },
        { name: 'Glow Cafe', verdict: 'likely_wanghong', confidence: -0.2, reasons: ['ad copy'] },
        { name: 'Corner Stall', verdict: 'mystery', features: ['cheap'] },
      ],
    });
    const analyzer = new LLMLegacyAnalyzer({ complete: scriptedCompleter([reply]).complete });

    const result = await analyzer.analyze(post, intent());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const [wang, glow, corner] = result.value;

    expect(wang?.name).toBe('Old Wang');
    expect(wang?.classification.verdict).toBe('genuine');
    expect(wang?.confidence).toBe(1);
    expect(wang?.classification.hasLocalSignal).toBe(true);
    expect(wang?.sourceDocumentIds).toEqual(['d9']);
    expect(wang?.location).toBe('Alpha City');
    expect(wang?.isRecommended).toBe(true);

    expect(glow?.classification.verdict).toBe('likely_promoted');
    expect(glow?.confidence).toBe(0);
    expect(glow?.isRecommended).toBe(false);

    expect(corner?.classification.verdict).toBe('unknown');
    expect(corner?.confidence).toBe(0.5);
    expect(corner?.features).toEqual(['cheap']);
  });

  it('should skip entries without a name', async () => {
    const reply = JSON.stringify({ restaurants: [{ name: '' }, { verdict: 'genuine' }, { name: 'Kept' }] });
    const analyzer = new LLMLegacyAnalyzer({ complete: scriptedCompleter([reply]).complete });

    const result = await analyzer.analyze(post, intent());

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map(r => r.name)).toEqual(['Kept']);
  });

  it('should pass exclusions and comment likes in the prompt', async () => {
    const completer = scriptedCompleter(['{"restaurants":[]}']);
    const analyzer = new LLMLegacyAnalyzer({ complete: completer.complete });

    await analyzer.analyze(post, intent({ excludeKeywords: ['chains'] }));

    const prompt = completer.requests[0]?.messages[1]?.content ?? '';
    expect(prompt).toContain('- the dumplings are great [4 likes]');
    expect(prompt).toContain('Skip restaurants matching: chains');
  });

  it('should report a reply without a restaurant list as malformed', async () => {
    const analyzer = new LLMLegacyAnalyzer({ complete: scriptedCompleter(['{"shops":[]}']).complete });

    const result = await analyzer.analyze(post, intent());

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('LEGACY_MALFORMED');
  });

  it('should map collaborator errors', async () => {
    const unavailable = new LLMLegacyAnalyzer({ complete: scriptedCompleter(['LLM_UNAVAILABLE']).complete });
    const failing = new LLMLegacyAnalyzer({ complete: scriptedCompleter(['LLM_ERROR']).complete });

    const first = await unavailable.analyze(post, intent());
    const second = await failing.analyze(post, intent());

    expect(first.ok ? null : first.error.code).toBe('LEGACY_UNAVAILABLE');
    expect(second.ok ? null : second.error.code).toBe('LEGACY_FAILED');
  });
});
