// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Type-Safe Error Handling
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE RESULT TYPE
// ─────────────────────────────────────────────────────────────────────────────────

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Result type representing either success (Ok) or failure (Err).
 *
 * Expected failures (a busy session, a missing record, a collaborator
 * that answered with garbage) travel as values; only programmer errors throw.
 *
 * @example
 * ```typescript
 * const result = await registry.beginTurn(sessionId);
 * if (!result.ok) {
 *   return res.status(409).json({ error: result.error.message });
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Normalize anything thrown into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * A failure a caller is expected to handle, keyed by a code the caller can
 * switch on. The message is for logs and API responses.
 */
export interface AppError<C extends string = string> {
  readonly code: C;
  readonly message: string;
  readonly cause?: Error;
  readonly context?: Record<string, unknown>;
}

export function appError<C extends string>(
  code: C,
  message: string,
  options?: { cause?: unknown; context?: Record<string, unknown> }
): AppError<C> {
  return {
    code,
    message,
    cause: options?.cause === undefined ? undefined : toError(options.cause),
    context: options?.context,
  };
}

export type AppResult<T, C extends string = string> = Result<T, AppError<C>>;

export type AsyncAppResult<T, C extends string = string> = AsyncResult<T, AppError<C>>;
