// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type LogLevel,
  type LoggerConfig,
  type LoggerOptions,
  type ILogger,
  type RequestLogData,
  LOG_LEVELS,
  configureLogger,
  getLogger,
  logRequest,
} from './logger.js';

export {
  type LoggingContext,
  runWithLoggingContext,
  getLoggingContext,
  getRequestId,
  generateRequestId,
} from './context.js';

export { type RedactionOptions, redact } from './redaction.js';
