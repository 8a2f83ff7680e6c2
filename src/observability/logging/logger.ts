// ═══════════════════════════════════════════════════════════════════════════════
// STRUCTURED LOGGER — Component Loggers with Context & Redaction
// ═══════════════════════════════════════════════════════════════════════════════
//
// JSON lines in production, coloured single lines elsewhere. Request, session
// and turn ids come from the logging context; secrets are redacted last.
//
// Usage:
//   const logger = getLogger({ component: 'orchestrator' });
//   logger.info('Phase finished', { phase: 2, documents: 7 });
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLoggingContext } from './context.js';
import { redact, type RedactionOptions } from './redaction.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export interface LoggerConfig {
  level: LogLevel;
  pretty: boolean;
  redactSecrets: boolean;
  redactionOptions?: RedactionOptions;
  serviceName: string;
}

export interface LoggerOptions {
  component?: string;
  context?: Record<string, unknown>;
}

export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

export interface RequestLogData {
  method: string;
  path: string;
  statusCode: number;
  duration: number;
  requestId?: string;
  userAgent?: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

let config: LoggerConfig = {
  level: 'info',
  pretty: process.env.NODE_ENV !== 'production',
  redactSecrets: true,
  serviceName: 'local-eats',
};

export function configureLogger(overrides: Partial<LoggerConfig>): void {
  config = { ...config, ...overrides };
}

// LOG_LEVEL is read per call so tests can silence loggers created at import time
function effectiveLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : config.level;
}

function enabled(level: LogLevel): boolean {
  return level !== 'silent' && LOG_LEVELS[level] >= LOG_LEVELS[effectiveLevel()];
}

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

interface LogEntry {
  readonly level: LogLevel;
  readonly time: string;
  readonly msg: string;
  readonly component?: string;
  readonly fields: Record<string, unknown>;
}

function errorFields(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) return { errorMessage: String(error) };
  return {
    errorName: error.name,
    errorMessage: error.message,
    errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
    ...(error.cause === undefined ? {} : { errorCause: String(error.cause) }),
  };
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
  silent: '',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

function formatPretty(entry: LogEntry): string {
  const time = entry.time.split('T')[1]?.replace('Z', '') ?? '';
  const { requestId, sessionId, ...rest } = entry.fields;
  const ids = [requestId, sessionId].filter((id): id is string => typeof id === 'string');
  const tag = [...ids.map(id => `[${id.slice(0, 12)}]`), entry.component ? `[${entry.component}]` : ''].join('');
  const extra = Object.keys(rest).length > 0 ? ` ${DIM}${JSON.stringify(rest)}${RESET}` : '';

  return `${DIM}${time}${RESET} ${COLORS[entry.level]}${entry.level.toUpperCase().padEnd(5)}${RESET} ${tag} ${entry.msg}${extra}`;
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    level: entry.level,
    time: entry.time,
    msg: entry.msg,
    service: config.serviceName,
    ...(entry.component ? { component: entry.component } : {}),
    ...entry.fields,
  });
}

function write(level: LogLevel, message: string, fields: Record<string, unknown>, component?: string): void {
  const merged = { ...getLoggingContext(), ...fields };
  const entry: LogEntry = {
    level,
    time: new Date().toISOString(),
    msg: message,
    component,
    fields: config.redactSecrets ? redact(merged, config.redactionOptions) : merged,
  };
  const line = config.pretty ? formatPretty(entry) : formatJson(entry);

  if (level === 'error' || level === 'fatal') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

export function getLogger(options: LoggerOptions = {}): ILogger {
  const { component, context: base = {} } = options;

  const log = (level: LogLevel, message: string, context: Record<string, unknown> = {}): void => {
    if (enabled(level)) write(level, message, { ...base, ...context }, component);
  };
  const logError = (level: LogLevel, message: string, error: unknown, context: Record<string, unknown> = {}): void => {
    if (!enabled(level)) return;
    write(level, message, { ...base, ...context, ...(error === undefined ? {} : errorFields(error)) }, component);
  };

  return {
    trace: (message, context) => log('trace', message, context),
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => logError('error', message, error, context),
    fatal: (message, error, context) => logError('fatal', message, error, context),
  };
}

const httpLogger = getLogger({ component: 'http' });

/**
 * One access line per finished request; 4xx at warn, 5xx at error.
 */
export function logRequest(data: RequestLogData): void {
  const context: Record<string, unknown> = {
    method: data.method,
    path: data.path,
    statusCode: data.statusCode,
    durationMs: data.duration,
    ...(data.requestId ? { requestId: data.requestId } : {}),
    ...(data.userAgent ? { userAgent: data.userAgent } : {}),
  };

  const line = `${data.method} ${data.path} ${data.statusCode}`;
  if (data.statusCode >= 500) httpLogger.error(line, undefined, context);
  else if (data.statusCode >= 400) httpLogger.warn(line, context);
  else httpLogger.info(line, context);
}
