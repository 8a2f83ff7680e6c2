// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST CONTEXT — Request Ids and Access Logging
// ═══════════════════════════════════════════════════════════════════════════════

import type { NextFunction, Request, Response } from 'express';
import { generateRequestId, logRequest, runWithLoggingContext } from '../../observability/logging/index.js';

/**
 * Gives every request an id (honouring X-Request-Id), echoes it back, and
 * logs the request once the response has finished.
 */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const requestId = req.get('x-request-id') ?? generateRequestId();
  const start = Date.now();
  res.setHeader('X-Request-Id', requestId);

  res.on('finish', () => {
    logRequest({
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      duration: Date.now() - start,
      requestId,
      userAgent: req.get('user-agent'),
    });
  });

  runWithLoggingContext({ requestId }, next);
}
