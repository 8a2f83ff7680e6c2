// ═══════════════════════════════════════════════════════════════════════════════
// HTTP JSON — GET with Timeout, Returned as a Result
// ═══════════════════════════════════════════════════════════════════════════════

import { appError, err, ok, type AsyncAppResult } from '../../../types/result.js';

export type HttpErrorCode = 'HTTP_TIMEOUT' | 'HTTP_STATUS' | 'HTTP_NETWORK' | 'HTTP_BODY';

export interface GetJsonOptions {
  readonly headers?: Record<string, string>;
  readonly timeoutMs: number;
}

export async function getJson(url: string, options: GetJsonOptions): AsyncAppResult<unknown, HttpErrorCode> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: { Accept: 'application/json', ...options.headers },
      signal: controller.signal,
    });

    if (!response.ok) {
      return err(appError('HTTP_STATUS', `HTTP ${response.status}`, { context: { status: response.status } }));
    }

    try {
      const body: unknown = await response.json();
      return ok(body);
    } catch (error) {
      return err(appError('HTTP_BODY', 'Response body is not JSON', { cause: error }));
    }
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      return err(appError('HTTP_TIMEOUT', `Timeout after ${options.timeoutMs}ms`, { cause: error }));
    }
    return err(appError('HTTP_NETWORK', error instanceof Error ? error.message : String(error), { cause: error }));
  } finally {
    clearTimeout(timeoutId);
  }
}
