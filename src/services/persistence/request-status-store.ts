// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST STATUS STORE — Durable Status of a Session's Latest Request
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import type { KeyValueStore } from '../../storage/index.js';
import { parseStored } from './schemas.js';

export type RequestStatus = 'loading' | 'completed' | 'error';

export interface RequestStatusRecord {
  readonly sessionId: string;
  readonly query: string;
  readonly location?: string;
  readonly status: RequestStatus;
  readonly resultsCount?: number;
  readonly error?: string;
  readonly createdAt: string;
  readonly updatedAt: string;
}

const RequestStatusSchema = z.object({
  sessionId: z.string(),
  query: z.string(),
  location: z.string().optional(),
  status: z.enum(['loading', 'completed', 'error']),
  resultsCount: z.number().optional(),
  error: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export class RequestStatusStore {
  constructor(
    private readonly store: KeyValueStore,
    private readonly retentionSeconds: number
  ) {}

  private key(sessionId: string): string {
    return `request:${sessionId}`;
  }

  /**
   * A new request replaces the previous one for the session.
   */
  async createRequest(sessionId: string, query: string, location?: string): Promise<RequestStatusRecord> {
    const now = new Date().toISOString();
    const record: RequestStatusRecord = { sessionId, query, location, status: 'loading', createdAt: now, updatedAt: now };
    await this.write(record);
    return record;
  }

  /**
   * null when there is no record to update.
   */
  async updateStatus(
    sessionId: string,
    status: RequestStatus,
    details: { resultsCount?: number; error?: string; location?: string } = {}
  ): Promise<RequestStatusRecord | null> {
    const existing = await this.getRequest(sessionId);
    if (!existing) return null;

    const record: RequestStatusRecord = {
      ...existing,
      ...details,
      status,
      updatedAt: new Date().toISOString(),
    };
    await this.write(record);
    return record;
  }

  async getRequest(sessionId: string): Promise<RequestStatusRecord | null> {
    return parseStored(RequestStatusSchema, await this.store.get(this.key(sessionId)));
  }

  async deleteRequest(sessionId: string): Promise<void> {
    await this.store.delete(this.key(sessionId));
  }

  private async write(record: RequestStatusRecord): Promise<void> {
    await this.store.set(this.key(record.sessionId), JSON.stringify(record), this.retentionSeconds);
  }
}
