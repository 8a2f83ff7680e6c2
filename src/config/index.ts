// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment, Server, Storage, Collaborators, Policy
// ═══════════════════════════════════════════════════════════════════════════════

import { envBool, envList, envNumber, envOptional, envString } from './env.js';
import {
  loadScoringPolicy,
  loadSearchPolicy,
  type ScoringPolicy,
  type SearchPolicy,
} from './search.js';

export { envBool, envFloat, envList, envNumber, envOptional, envString } from './env.js';
export {
  DEFAULT_SCORING_POLICY,
  DEFAULT_SEARCH_POLICY,
  loadScoringPolicy,
  loadSearchPolicy,
  validateScoringPolicy,
  validateSearchPolicy,
  type ClassificationThresholds,
  type DocumentSort,
  type EngagementStep,
  type ScoringPolicy,
  type SearchPolicy,
} from './search.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

export type Environment = 'development' | 'staging' | 'production' | 'test';

export interface EnvironmentConfig {
  environment: Environment;
  isProduction: boolean;
  isDevelopment: boolean;
  isTest: boolean;
}

function toEnvironment(value: string): Environment {
  switch (value) {
    case 'production':
    case 'staging':
    case 'test':
      return value;
    default:
      return 'development';
  }
}

export function loadEnvironmentConfig(): EnvironmentConfig {
  const environment = toEnvironment(envString('NODE_ENV', 'development'));

  return {
    environment,
    isProduction: environment === 'production',
    isDevelopment: environment === 'development',
    isTest: environment === 'test',
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// SERVER
// ─────────────────────────────────────────────────────────────────────────────────

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[];
  /** Prefix the search router is mounted under */
  apiPrefix: string;
}

export function loadServerConfig(): ServerConfig {
  return {
    port: envNumber('PORT', 3000),
    host: envString('HOST', '0.0.0.0'),
    corsOrigins: envList('CORS_ORIGINS', ['*']),
    apiPrefix: envString('API_PREFIX', '/api/v1'),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// REDIS
// ─────────────────────────────────────────────────────────────────────────────────

export interface RedisConfig {
  /** Undefined means no Redis: the in-memory store is used */
  url?: string;
  connectTimeoutMs: number;
  keyPrefix: string;
}

/**
 * REDIS_URL wins; otherwise the URL is assembled from the individual settings.
 */
export function buildRedisUrl(): string | undefined {
  const explicit = envOptional('REDIS_URL');
  if (explicit) return explicit;

  const host = envOptional('REDIS_HOST');
  if (!host) return undefined;

  const port = envString('REDIS_PORT', '6379');
  const db = envString('REDIS_DATABASE', '0');
  const username = envOptional('REDIS_USERNAME');
  const password = envOptional('REDIS_PASSWORD');

  if (username && password) {
    return `redis://${encodeURIComponent(username)}:${encodeURIComponent(password)}@${host}:${port}/${db}`;
  }
  if (password) {
    return `redis://:${encodeURIComponent(password)}@${host}:${port}/${db}`;
  }
  return `redis://${host}:${port}/${db}`;
}

export function loadRedisConfig(): RedisConfig {
  return {
    url: buildRedisUrl(),
    connectTimeoutMs: envNumber('REDIS_CONNECT_TIMEOUT_MS', 5000),
    keyPrefix: envString('REDIS_KEY_PREFIX', 'eats:'),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// LLM (TEXT-UNDERSTANDING COLLABORATOR)
// ─────────────────────────────────────────────────────────────────────────────────

export interface LLMConfig {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  taggingTimeoutMs: number;
  followUpTimeoutMs: number;
  intentTimeoutMs: number;
  analyzerTimeoutMs: number;
  /** Units sent to the tagger per request */
  taggingBatchSize: number;
}

export function loadLLMConfig(): LLMConfig {
  return {
    apiKey: envOptional('OPENAI_API_KEY'),
    baseUrl: envOptional('OPENAI_BASE_URL'),
    model: envString('OPENAI_MODEL', 'gpt-4o-mini'),
    taggingTimeoutMs: envNumber('LLM_TAGGING_TIMEOUT_MS', 20000),
    followUpTimeoutMs: envNumber('LLM_FOLLOW_UP_TIMEOUT_MS', 8000),
    intentTimeoutMs: envNumber('LLM_INTENT_TIMEOUT_MS', 8000),
    analyzerTimeoutMs: envNumber('LLM_ANALYZER_TIMEOUT_MS', 30000),
    taggingBatchSize: envNumber('LLM_TAGGING_BATCH_SIZE', 30),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// EXTERNAL SOURCES
// ─────────────────────────────────────────────────────────────────────────────────

export interface SourcesConfig {
  /** Base URL of the content search service */
  documentSourceUrl?: string;
  documentSourceToken?: string;
  /** Base URL of the map/POI lookup service */
  poiServiceUrl?: string;
  poiServiceKey?: string;
  poiTimeoutMs: number;
  userAgent: string;
}

export function loadSourcesConfig(): SourcesConfig {
  return {
    documentSourceUrl: envOptional('DOCUMENT_SOURCE_URL'),
    documentSourceToken: envOptional('DOCUMENT_SOURCE_TOKEN'),
    poiServiceUrl: envOptional('POI_SERVICE_URL'),
    poiServiceKey: envOptional('POI_SERVICE_KEY'),
    poiTimeoutMs: envNumber('POI_TIMEOUT_MS', 5000),
    userAgent: envString('SOURCE_USER_AGENT', 'local-eats-backend/1.0'),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// STREAMING & SESSIONS
// ─────────────────────────────────────────────────────────────────────────────────

export interface StreamConfig {
  /** Idle subscriber receives a heartbeat after this long without events */
  heartbeatIntervalMs: number;
  /** Subscriber gives up after this long without a terminal event */
  maxSubscriptionMs: number;
  /** Completed sessions keep their in-memory event log this long */
  completedRetentionMs: number;
}

export function loadStreamConfig(): StreamConfig {
  return {
    heartbeatIntervalMs: envNumber('STREAM_HEARTBEAT_MS', 30000),
    maxSubscriptionMs: envNumber('STREAM_MAX_SUBSCRIPTION_MS', 10 * 60 * 1000),
    completedRetentionMs: envNumber('STREAM_COMPLETED_RETENTION_MS', 30 * 60 * 1000),
  };
}

export interface ContextCacheConfig {
  ttlSeconds: number;
  windowSize: number;
  /** Messages handed to the follow-up interpreter */
  historyTurns: number;
}

export function loadContextCacheConfig(): ContextCacheConfig {
  return {
    ttlSeconds: envNumber('CONTEXT_TTL_SECONDS', 86400),
    windowSize: envNumber('CONTEXT_WINDOW_SIZE', 20),
    historyTurns: envNumber('CONTEXT_HISTORY_TURNS', 5),
  };
}

export interface PersistenceConfig {
  /** Durable turn results and request status records expire after this long */
  retentionSeconds: number;
}

export function loadPersistenceConfig(): PersistenceConfig {
  return {
    retentionSeconds: envNumber('PERSISTENCE_RETENTION_SECONDS', 30 * 24 * 60 * 60),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGING
// ─────────────────────────────────────────────────────────────────────────────────

export interface LoggingConfig {
  debugMode: boolean;
  redactSecrets: boolean;
}

export function loadLoggingConfig(): LoggingConfig {
  return {
    debugMode: envBool('DEBUG', false),
    redactSecrets: envBool('REDACT_SECRETS', true),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMBINED CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export interface AppConfig {
  env: EnvironmentConfig;
  server: ServerConfig;
  redis: RedisConfig;
  llm: LLMConfig;
  sources: SourcesConfig;
  search: SearchPolicy;
  scoring: ScoringPolicy;
  stream: StreamConfig;
  contextCache: ContextCacheConfig;
  persistence: PersistenceConfig;
  logging: LoggingConfig;
}

let cachedConfig: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    env: loadEnvironmentConfig(),
    server: loadServerConfig(),
    redis: loadRedisConfig(),
    llm: loadLLMConfig(),
    sources: loadSourcesConfig(),
    search: loadSearchPolicy(),
    scoring: loadScoringPolicy(),
    stream: loadStreamConfig(),
    contextCache: loadContextCacheConfig(),
    persistence: loadPersistenceConfig(),
    logging: loadLoggingConfig(),
  };

  return cachedConfig;
}

export function reloadConfig(): AppConfig {
  cachedConfig = null;
  return loadConfig();
}

// ─────────────────────────────────────────────────────────────────────────────────
// CAPABILITY CHECKS
// ─────────────────────────────────────────────────────────────────────────────────

export function canUseLLM(): boolean {
  return loadConfig().llm.apiKey !== undefined;
}

export function canEnrichPOI(): boolean {
  return loadConfig().sources.poiServiceUrl !== undefined;
}
