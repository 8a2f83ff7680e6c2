// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY STORE — In-Memory KeyValueStore for Tests and Redis-less Development
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeyValueStore } from './types.js';

type Entry =
  | { kind: 'string'; value: string; expiresAt?: number }
  | { kind: 'list'; value: string[]; expiresAt?: number }
  | { kind: 'hash'; value: Map<string, string>; expiresAt?: number };

export class MemoryStore implements KeyValueStore {
  private entries: Map<string, Entry> = new Map();

  // ═══════════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════════════

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt !== undefined && Date.now() > entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry;
  }

  private list(key: string): string[] | undefined {
    const entry = this.live(key);
    return entry?.kind === 'list' ? entry.value : undefined;
  }

  private hash(key: string): Map<string, string> | undefined {
    const entry = this.live(key);
    return entry?.kind === 'hash' ? entry.value : undefined;
  }

  /** Redis-style inclusive range with negative indices */
  private static bounds(len: number, start: number, stop: number): [number, number] {
    const startIdx = start < 0 ? Math.max(0, len + start) : start;
    const stopIdx = stop < 0 ? len + stop : Math.min(stop, len - 1);
    return [startIdx, stopIdx];
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // STRING OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async get(key: string): Promise<string | null> {
    const entry = this.live(key);
    return entry?.kind === 'string' ? entry.value : null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const expiresAt = ttlSeconds ? Date.now() + ttlSeconds * 1000 : undefined;
    this.entries.set(key, { kind: 'string', value, expiresAt });
  }

  async delete(key: string): Promise<boolean> {
    const existed = this.live(key) !== undefined;
    this.entries.delete(key);
    return existed;
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== undefined;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) return false;
    entry.expiresAt = Date.now() + ttlSeconds * 1000;
    return true;
  }

  async incr(key: string): Promise<number> {
    const entry = this.live(key);
    const current = entry?.kind === 'string' ? parseInt(entry.value, 10) || 0 : 0;
    const next = current + 1;
    this.entries.set(key, { kind: 'string', value: next.toString(), expiresAt: entry?.expiresAt });
    return next;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIST OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async rpush(key: string, ...values: string[]): Promise<number> {
    let list = this.list(key);
    if (!list) {
      list = [];
      this.entries.set(key, { kind: 'list', value: list });
    }
    list.push(...values);
    return list.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.list(key);
    if (!list) return [];

    const [startIdx, stopIdx] = MemoryStore.bounds(list.length, start, stop);
    if (startIdx > stopIdx || startIdx >= list.length) return [];

    return list.slice(startIdx, stopIdx + 1);
  }

  async llen(key: string): Promise<number> {
    return this.list(key)?.length ?? 0;
  }

  async ltrim(key: string, start: number, stop: number): Promise<void> {
    const entry = this.live(key);
    if (entry?.kind !== 'list') return;

    const [startIdx, stopIdx] = MemoryStore.bounds(entry.value.length, start, stop);
    entry.value = startIdx > stopIdx ? [] : entry.value.slice(startIdx, stopIdx + 1);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // HASH OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async hget(key: string, field: string): Promise<string | null> {
    return this.hash(key)?.get(field) ?? null;
  }

  async hset(key: string, field: string, value: string): Promise<number> {
    let hash = this.hash(key);
    if (!hash) {
      hash = new Map();
      this.entries.set(key, { kind: 'hash', value: hash });
    }
    const existed = hash.has(field);
    hash.set(field, value);
    return existed ? 0 : 1;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    const hash = this.hash(key);
    return hash ? Object.fromEntries(hash) : {};
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // UTILITY
  // ═══════════════════════════════════════════════════════════════════════════════

  async keys(pattern: string): Promise<string[]> {
    const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
    const regex = new RegExp(`^${escaped}$`);
    return [...this.entries.keys()].filter(key => this.live(key) !== undefined && regex.test(key));
  }

  async ping(): Promise<string> {
    return 'PONG';
  }

  isConnected(): boolean {
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════════════

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }
}
