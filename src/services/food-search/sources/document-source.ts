// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT SOURCE — Contract and HTTP Client for the Content Search Service
// ═══════════════════════════════════════════════════════════════════════════════
//
// A failed call is an Err; an empty result is Ok([]). Callers rely on the
// difference to tell "nothing found" from "source down".
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import type { DocumentSort } from '../../../config/search.js';
import { getLogger } from '../../../observability/logging/index.js';
import { appError, err, ok, type AsyncAppResult } from '../../../types/result.js';
import type { SourceDocument } from '../types.js';
import { getJson } from './http.js';

// ─────────────────────────────────────────────────────────────────────────────────
// CONTRACT
// ─────────────────────────────────────────────────────────────────────────────────

export type SourceErrorCode = 'SOURCE_UNAVAILABLE' | 'SOURCE_TIMEOUT' | 'SOURCE_FAILED' | 'SOURCE_MALFORMED';

export interface DocumentSearchOptions {
  readonly limit: number;
  readonly sort: DocumentSort;
}

export interface DocumentSource {
  search(query: string, options: DocumentSearchOptions): AsyncAppResult<SourceDocument[], SourceErrorCode>;
  /** null when the id is unknown */
  fetch(documentId: string): AsyncAppResult<SourceDocument | null, SourceErrorCode>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// WIRE SCHEMA
// ─────────────────────────────────────────────────────────────────────────────────

const CommentSchema = z.object({
  text: z.string().default(''),
  likes: z.coerce.number().int().nonnegative().optional().catch(undefined),
  subCommentCount: z.coerce.number().int().nonnegative().optional().catch(undefined),
  author: z.string().optional().catch(undefined),
});

export const SourceDocumentSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  title: z.string().default(''),
  text: z.string().default(''),
  comments: z.array(z.unknown()).default([]).transform(raw =>
    raw.flatMap(entry => {
      const comment = CommentSchema.safeParse(entry);
      return comment.success && comment.data.text ? [comment.data] : [];
    })
  ),
});

const SearchResponseSchema = z.object({
  documents: z.array(z.unknown()),
});

function parseDocuments(raw: readonly unknown[]): SourceDocument[] {
  return raw.flatMap(entry => {
    const parsed = SourceDocumentSchema.safeParse(entry);
    return parsed.success ? [parsed.data] : [];
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// HTTP CLIENT
// ─────────────────────────────────────────────────────────────────────────────────

export interface HttpDocumentSourceOptions {
  readonly baseUrl: string;
  readonly token?: string;
  readonly timeoutMs: number;
  readonly userAgent: string;
}

const logger = getLogger({ component: 'document-source' });

export class HttpDocumentSource implements DocumentSource {
  constructor(private readonly options: HttpDocumentSourceOptions) {}

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'User-Agent': this.options.userAgent };
    if (this.options.token) headers.Authorization = `Bearer ${this.options.token}`;
    return headers;
  }

  async search(query: string, options: DocumentSearchOptions): AsyncAppResult<SourceDocument[], SourceErrorCode> {
    const url = new URL('search', this.withSlash(this.options.baseUrl));
    url.searchParams.set('q', query);
    url.searchParams.set('limit', String(options.limit));
    url.searchParams.set('sort', options.sort);
    url.searchParams.set('comments', 'true');

    const response = await getJson(url.toString(), { headers: this.headers(), timeoutMs: this.options.timeoutMs });
    if (!response.ok) {
      logger.warn('Document search failed', { query, code: response.error.code, message: response.error.message });
      const code: SourceErrorCode = response.error.code === 'HTTP_TIMEOUT' ? 'SOURCE_TIMEOUT' : 'SOURCE_FAILED';
      return err(appError(code, response.error.message, { cause: response.error.cause }));
    }

    const parsed = SearchResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(appError('SOURCE_MALFORMED', 'Search response has no document list'));
    }

    return ok(parseDocuments(parsed.data.documents).slice(0, options.limit));
  }

  async fetch(documentId: string): AsyncAppResult<SourceDocument | null, SourceErrorCode> {
    const url = new URL(`documents/${encodeURIComponent(documentId)}`, this.withSlash(this.options.baseUrl));

    const response = await getJson(url.toString(), { headers: this.headers(), timeoutMs: this.options.timeoutMs });
    if (!response.ok) {
      if (response.error.context?.status === 404) return ok(null);
      const code: SourceErrorCode = response.error.code === 'HTTP_TIMEOUT' ? 'SOURCE_TIMEOUT' : 'SOURCE_FAILED';
      return err(appError(code, response.error.message, { cause: response.error.cause }));
    }

    const parsed = SourceDocumentSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(appError('SOURCE_MALFORMED', `Document ${documentId} is malformed`));
    }
    return ok(parsed.data);
  }

  private withSlash(base: string): string {
    return base.endsWith('/') ? base : `${base}/`;
  }
}

/**
 * Stand-in used when no source is configured: every call fails as unavailable.
 */
export class UnconfiguredDocumentSource implements DocumentSource {
  async search(): AsyncAppResult<SourceDocument[], SourceErrorCode> {
    return err(appError('SOURCE_UNAVAILABLE', 'No document source configured'));
  }

  async fetch(): AsyncAppResult<SourceDocument | null, SourceErrorCode> {
    return err(appError('SOURCE_UNAVAILABLE', 'No document source configured'));
  }
}
