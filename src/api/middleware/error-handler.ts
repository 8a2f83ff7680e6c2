// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — API Error Classes and the Express Error Middleware
// ═══════════════════════════════════════════════════════════════════════════════

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { loadConfig } from '../../config/index.js';
import { getLogger, getRequestId } from '../../observability/logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

export class ApiError extends Error {
  constructor(
    message: string,
    readonly statusCode: number = 400,
    readonly code: string = 'BAD_REQUEST',
    readonly details?: Record<string, unknown>,
    /** false for failures the client cannot fix */
    readonly isOperational: boolean = true
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class ServiceUnavailableError extends ApiError {
  constructor(message: string) {
    super(message, 503, 'SERVICE_UNAVAILABLE', undefined, false);
    this.name = 'ServiceUnavailableError';
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string, id?: string) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 409, 'CONFLICT', details);
    this.name = 'ConflictError';
  }
}

export class InternalError extends ApiError {
  constructor(message = 'Internal server error') {
    super(message, 500, 'INTERNAL_ERROR', undefined, false);
    this.name = 'InternalError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESPONSE MAPPING
// ─────────────────────────────────────────────────────────────────────────────────

export interface ErrorResponseBody {
  readonly error: string;
  readonly code: string;
  readonly details?: Record<string, unknown>;
  readonly requestId?: string;
  readonly timestamp: string;
}

export interface ErrorResponse {
  readonly statusCode: number;
  readonly body: ErrorResponseBody;
}

const SANITIZED_MESSAGE = 'An unexpected error occurred';

function isJsonSyntaxError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

/**
 * Map anything thrown in a request to a status and JSON body. In production
 * 500 responses carry no message or details from the original error.
 */
export function toErrorResponse(
  error: unknown,
  options: { requestId?: string; isProduction?: boolean } = {}
): ErrorResponse {
  const timestamp = new Date().toISOString();
  const base = { requestId: options.requestId, timestamp };

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      body: {
        ...base,
        error: 'Invalid request',
        code: 'VALIDATION_ERROR',
        details: { issues: error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })) },
      },
    };
  }

  if (isJsonSyntaxError(error)) {
    return { statusCode: 400, body: { ...base, error: 'Invalid JSON in request body', code: 'INVALID_JSON' } };
  }

  if (error instanceof ApiError) {
    const sanitize = error.statusCode >= 500 && options.isProduction === true;
    return {
      statusCode: error.statusCode,
      body: {
        ...base,
        error: sanitize ? SANITIZED_MESSAGE : error.message,
        code: error.code,
        details: sanitize ? undefined : error.details,
      },
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    statusCode: 500,
    body: {
      ...base,
      error: options.isProduction === true ? SANITIZED_MESSAGE : message,
      code: 'INTERNAL_ERROR',
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

const logger = getLogger({ component: 'error-handler' });

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const requestId = getRequestId() ?? req.get('x-request-id');
  const response = toErrorResponse(error, { requestId, isProduction: loadConfig().env.isProduction });

  if (response.statusCode >= 500) {
    logger.error('Request failed', error, { path: req.path, method: req.method });
  } else {
    logger.debug('Request rejected', { path: req.path, code: response.body.code });
  }

  res.status(response.statusCode).json(response.body);
}

/**
 * Forward a rejected handler promise to the error middleware.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}
