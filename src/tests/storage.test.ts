// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE TESTS — Memory Store, Store Manager, Storage Health
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { checkStorage } from '../api/routes/health.js';
import { MemoryStore, StoreManager } from '../storage/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// MEMORY STORE
// ─────────────────────────────────────────────────────────────────────────────────

describe('MemoryStore', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('strings', () => {
    it('should set, get and delete values', async () => {
      await store.set('key1', 'value1');
      expect(await store.get('key1')).toBe('value1');

      expect(await store.delete('key1')).toBe(true);
      expect(await store.delete('key1')).toBe(false);
      expect(await store.get('key1')).toBeNull();
    });

    it('should expire values after their TTL', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
      await store.set('short', 'lived', 10);

      vi.setSystemTime(new Date('2026-01-01T00:00:10Z'));
      expect(await store.exists('short')).toBe(true);

      vi.setSystemTime(new Date('2026-01-01T00:00:11Z'));
      expect(await store.get('short')).toBeNull();
    });

    it('should count up from nothing and keep an existing TTL', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));

      expect(await store.incr('counter')).toBe(1);
      await store.expire('counter', 5);
      expect(await store.incr('counter')).toBe(2);

      vi.setSystemTime(new Date('2026-01-01T00:00:06Z'));
      expect(await store.incr('counter')).toBe(1);
    });

    it('should not expire a missing key', async () => {
      expect(await store.expire('missing', 5)).toBe(false);
    });
  });

  describe('lists', () => {
    it('should push and read ranges with negative indices', async () => {
      expect(await store.rpush('list', 'a', 'b', 'c', 'd')).toBe(4);

      expect(await store.lrange('list', 0, -1)).toEqual(['a', 'b', 'c', 'd']);
      expect(await store.lrange('list', -2, -1)).toEqual(['c', 'd']);
      expect(await store.lrange('list', 1, 10)).toEqual(['b', 'c', 'd']);
      expect(await store.lrange('list', 5, 6)).toEqual([]);
      expect(await store.lrange('missing', 0, -1)).toEqual([]);
    });

    it('should trim to the newest entries', async () => {
      await store.rpush('list', 'a', 'b', 'c', 'd');

      await store.ltrim('list', -2, -1);

      expect(await store.lrange('list', 0, -1)).toEqual(['c', 'd']);
      expect(await store.llen('list')).toBe(2);
    });

    it('should not read a string key as a list', async () => {
      await store.set('plain', 'value');

      expect(await store.llen('plain')).toBe(0);
    });
  });

  describe('hashes', () => {
    it('should set fields and report new ones', async () => {
      expect(await store.hset('hash', 'a', '1')).toBe(1);
      expect(await store.hset('hash', 'a', '2')).toBe(0);
      await store.hset('hash', 'b', '3');

      expect(await store.hget('hash', 'a')).toBe('2');
      expect(await store.hget('hash', 'missing')).toBeNull();
      expect(await store.hgetall('hash')).toEqual({ a: '2', b: '3' });
      expect(await store.hgetall('nothing')).toEqual({});
    });
  });

  describe('keys', () => {
    it('should match glob patterns literally apart from the wildcard', async () => {
      await store.set('turns:s1:1', 'x');
      await store.set('turns:s1:2', 'x');
      await store.set('turns:s2:1', 'x');
      await store.set('turns.s1.3', 'x');

      expect((await store.keys('turns:s1:*')).sort()).toEqual(['turns:s1:1', 'turns:s1:2']);
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// STORE MANAGER
// ─────────────────────────────────────────────────────────────────────────────────

describe('StoreManager', () => {
  it('should use the memory store without a Redis URL', async () => {
    const manager = new StoreManager();

    const store = await manager.initialize();

    expect(store).toBeInstanceOf(MemoryStore);
    expect(manager.getStore()).toBe(store);
    expect(manager.isUsingRedis()).toBe(false);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// STORAGE HEALTH
// ─────────────────────────────────────────────────────────────────────────────────

describe('checkStorage', () => {
  it('should report a responsive store as up', async () => {
    const health = await checkStorage(new MemoryStore());

    expect(health.status).toBe('up');
  });

  it('should report an odd reply as degraded', async () => {
    class OddStore extends MemoryStore {
      override async ping(): Promise<string> {
        return 'MAYBE';
      }
    }

    const health = await checkStorage(new OddStore());

    expect(health).toMatchObject({ status: 'degraded', message: 'Unexpected ping reply: MAYBE' });
  });

  it('should report a failing store as down', async () => {
    class DeadStore extends MemoryStore {
      override async ping(): Promise<string> {
        throw new Error('connection refused');
      }
    }

    expect(await checkStorage(new DeadStore())).toEqual({ status: 'down', message: 'connection refused' });
  });
});
