// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING CONTEXT — Request/Session Correlation via AsyncLocalStorage
// ═══════════════════════════════════════════════════════════════════════════════
//
// Anything logged inside runWithLoggingContext() picks up the request id and
// session id without threading them through every call.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { AsyncLocalStorage } from 'node:async_hooks';
import { v4 as uuidv4 } from 'uuid';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface LoggingContext {
  readonly requestId?: string;
  readonly sessionId?: string;
  readonly turnId?: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// STORAGE
// ─────────────────────────────────────────────────────────────────────────────────

const storage = new AsyncLocalStorage<LoggingContext>();

/**
 * Run a function with a logging context. Nested calls inherit and extend the outer context.
 */
export function runWithLoggingContext<T>(context: LoggingContext, fn: () => T): T {
  const parent = storage.getStore() ?? {};
  return storage.run({ ...parent, ...context }, fn);
}

/**
 * Current context as plain fields, with undefined values dropped.
 */
export function getLoggingContext(): Record<string, unknown> {
  const context = storage.getStore();
  if (!context) return {};

  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (value !== undefined) {
      fields[key] = value;
    }
  }
  return fields;
}

export function getRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}

export function generateRequestId(): string {
  return `req-${uuidv4()}`;
}
