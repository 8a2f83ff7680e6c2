// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT SOURCE & CONCURRENCY TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi, afterEach } from 'vitest';
import { TimeoutError, mapWithConcurrency, withTimeout } from '../concurrency.js';
import { HttpDocumentSource, UnconfiguredDocumentSource } from '../sources/document-source.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

function stubFetch(respond: () => Promise<Response>) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => respond());
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

const json = (body: unknown, status = 200) => async () => new Response(JSON.stringify(body), { status });

// ─────────────────────────────────────────────────────────────────────────────────
// HttpDocumentSource
// ─────────────────────────────────────────────────────────────────────────────────

describe('HttpDocumentSource', () => {
  const source = new HttpDocumentSource({
    baseUrl: 'https://source.test/api',
    token: 'test-token',
    timeoutMs: 1000,
    userAgent: 'local-eats-test',
  });

  it('should search with the query, limit and sort', async () => {
    const fetchMock = stubFetch(json({ documents: [] }));

    await source.search('noodles Alpha City', { limit: 2, sort: 'most_comments' });

    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://source.test/api/search?q=noodles+Alpha+City&limit=2&sort=most_comments&comments=true'
    );
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      Accept: 'application/json',
      'User-Agent': 'local-eats-test',
      Authorization: 'Bearer test-token',
    });
  });

  it('should keep well-formed documents and comments up to the limit', async () => {
    stubFetch(
      json({
        documents: [
          { id: 7, title: 'Weekend eats', comments: [{ text: 'try Old Wang', likes: '3' }, { text: '' }, 5] },
          { title: 'no id' },
          { id: 'd2' },
          { id: 'd3' },
        ],
      })
    );

    const result = await source.search('noodles', { limit: 2, sort: 'general' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map(doc => doc.id)).toEqual(['7', 'd2']);
    expect(result.value[0]).toEqual({
      id: '7',
      title: 'Weekend eats',
      text: '',
      comments: [{ text: 'try Old Wang', likes: 3 }],
    });
  });

  it('should tell a timeout from other failures', async () => {
    stubFetch(async () => {
      throw Object.assign(new Error('aborted'), { name: 'AbortError' });
    });
    const timedOut = await source.search('noodles', { limit: 2, sort: 'general' });
    expect(timedOut.ok ? null : timedOut.error.code).toBe('SOURCE_TIMEOUT');

    stubFetch(json({}, 502));
    const failed = await source.search('noodles', { limit: 2, sort: 'general' });
    expect(failed.ok ? null : failed.error.code).toBe('SOURCE_FAILED');

    stubFetch(json({ results: [] }));
    const malformed = await source.search('noodles', { limit: 2, sort: 'general' });
    expect(malformed.ok ? null : malformed.error.code).toBe('SOURCE_MALFORMED');
  });

  it('should fetch one document and treat 404 as unknown', async () => {
    const fetchMock = stubFetch(json({ id: 'd/1', title: 'Lunch notes' }));
    const found = await source.fetch('d/1');

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://source.test/api/documents/d%2F1');
    expect(found.ok && found.value?.title).toBe('Lunch notes');

    stubFetch(json({}, 404));
    expect(await source.fetch('missing')).toEqual({ ok: true, value: null });
  });
});

describe('UnconfiguredDocumentSource', () => {
  it('should fail every call as unavailable', async () => {
    const source = new UnconfiguredDocumentSource();

    const searched = await source.search();
    const fetched = await source.fetch();

    expect(searched.ok ? null : searched.error.code).toBe('SOURCE_UNAVAILABLE');
    expect(fetched.ok ? null : fetched.error.code).toBe('SOURCE_UNAVAILABLE');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CONCURRENCY
// ─────────────────────────────────────────────────────────────────────────────────

describe('withTimeout', () => {
  it('should pass a value through', async () => {
    expect(await withTimeout(Promise.resolve('done'), 50, 'quick')).toBe('done');
  });

  it('should reject a call that never settles', async () => {
    const pending = withTimeout(new Promise<never>(() => undefined), 10, 'slow query');

    await expect(pending).rejects.toBeInstanceOf(TimeoutError);
    await expect(pending).rejects.toThrow('slow query timed out after 10ms');
  });
});

describe('mapWithConcurrency', () => {
  it('should keep input order with at most the limit in flight', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (delay, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, delay));
      inFlight--;
      return `${index}:${delay}`;
    });

    expect(results).toEqual(['0:30', '1:10', '2:20', '3:5']);
    expect(peak).toBe(2);
  });

  it('should return nothing for no items', async () => {
    expect(await mapWithConcurrency([], 3, async () => 'x')).toEqual([]);
  });
});
