// ═══════════════════════════════════════════════════════════════════════════════
// LLM CLIENT — Text-Understanding Collaborator over the OpenAI Chat API
// ═══════════════════════════════════════════════════════════════════════════════
//
// Callers never see thrown errors from here: every call resolves to a Result.
// The LLM is a fallback or a labeller, never the source of arithmetic.
//
// ═══════════════════════════════════════════════════════════════════════════════

import OpenAI from 'openai';
import { loadConfig } from '../../config/index.js';
import { getLogger } from '../../observability/logging/index.js';
import { appError, err, ok, type AsyncAppResult } from '../../types/result.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LLMErrorCode = 'LLM_UNAVAILABLE' | 'LLM_TIMEOUT' | 'LLM_ERROR' | 'LLM_EMPTY';

export interface ChatMessage {
  readonly role: 'system' | 'user' | 'assistant';
  readonly content: string;
}

export interface ChatRequest {
  readonly messages: readonly ChatMessage[];
  readonly maxTokens: number;
  readonly timeoutMs: number;
  /** Tag for logs */
  readonly purpose: string;
}

/**
 * Anything that can answer a chat request. The OpenAI-backed `completeChat`
 * is the production implementation; tests pass their own.
 */
export type ChatCompleter = (request: ChatRequest) => AsyncAppResult<string, LLMErrorCode>;

const logger = getLogger({ component: 'llm' });

// ─────────────────────────────────────────────────────────────────────────────────
// OPENAI CLIENT SINGLETON
// ─────────────────────────────────────────────────────────────────────────────────

let openaiClient: OpenAI | null = null;

function getOpenAIClient(): OpenAI | null {
  const { apiKey, baseUrl } = loadConfig().llm;
  if (!openaiClient && apiKey) {
    openaiClient = new OpenAI({ apiKey, baseURL: baseUrl });
  }
  return openaiClient;
}

export function isLLMAvailable(): boolean {
  return getOpenAIClient() !== null;
}

/**
 * Drop the cached client (tests, key rotation).
 */
export function resetOpenAIClient(): void {
  openaiClient = null;
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMPLETION
// ─────────────────────────────────────────────────────────────────────────────────

export const completeChat: ChatCompleter = async request => {
  const client = getOpenAIClient();
  if (!client) {
    return err(appError('LLM_UNAVAILABLE', 'OpenAI client not configured'));
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);
  const start = Date.now();

  try {
    const response = await client.chat.completions.create(
      {
        model: loadConfig().llm.model,
        messages: request.messages.map(message => ({ role: message.role, content: message.content })),
        max_tokens: request.maxTokens,
        temperature: 0,
      },
      { signal: controller.signal }
    );

    const content = response.choices[0]?.message?.content?.trim() ?? '';
    logger.debug('Completion received', {
      purpose: request.purpose,
      durationMs: Date.now() - start,
      length: content.length,
    });

    if (!content) {
      return err(appError('LLM_EMPTY', `Empty completion for ${request.purpose}`));
    }
    return ok(content);
  } catch (error) {
    if (controller.signal.aborted) {
      logger.warn('Completion timed out', { purpose: request.purpose, timeoutMs: request.timeoutMs });
      return err(appError('LLM_TIMEOUT', `${request.purpose} timed out after ${request.timeoutMs}ms`, { cause: error }));
    }

    logger.error('Completion failed', error, { purpose: request.purpose });
    return err(appError('LLM_ERROR', `${request.purpose} failed`, { cause: error }));
  } finally {
    clearTimeout(timeoutId);
  }
};

// ─────────────────────────────────────────────────────────────────────────────────
// RESPONSE PARSING
// ─────────────────────────────────────────────────────────────────────────────────

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parse JSON out of a completion: plain, inside a markdown fence, or the
 * outermost object/array embedded in prose. undefined when nothing parses.
 */
export function extractJson(content: string): unknown {
  const trimmed = content.trim();

  const direct = tryParse(trimmed);
  if (direct !== undefined) return direct;

  const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced?.[1]) {
    const inner = tryParse(fenced[1].trim());
    if (inner !== undefined) return inner;
  }

  for (const [open, close] of [['{', '}'], ['[', ']']] as const) {
    const first = trimmed.indexOf(open);
    const last = trimmed.lastIndexOf(close);
    if (first !== -1 && last > first) {
      const embedded = tryParse(trimmed.slice(first, last + 1));
      if (embedded !== undefined) return embedded;
    }
  }

  return undefined;
}
