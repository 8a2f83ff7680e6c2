// ═══════════════════════════════════════════════════════════════════════════════
// TEST SETUP — Quiet Logs, No Collaborators, Fresh Config
// ═══════════════════════════════════════════════════════════════════════════════

import { afterEach, beforeEach } from 'vitest';
import { reloadConfig } from '../config/index.js';

beforeEach(() => {
  process.env.NODE_ENV = 'test';
  process.env.LOG_LEVEL = 'silent';

  // Tests never reach the real collaborators
  delete process.env.OPENAI_API_KEY;
  delete process.env.REDIS_URL;
  delete process.env.REDIS_HOST;
  delete process.env.DOCUMENT_SOURCE_URL;
  delete process.env.POI_SERVICE_URL;

  reloadConfig();
});

afterEach(() => {
  reloadConfig();
});
