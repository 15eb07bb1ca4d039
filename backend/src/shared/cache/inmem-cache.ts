/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Default session backend for a single-process deployment (no Redis to run).
 * - Lets tests run without external infra.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - const cache = new InMemCache({ now: () => fakeNow })  // tests drive expiry
 *
 * Expiry is lazy: an expired entry is dropped when it is next read.
 */

import type { Cache, CacheSetOptions } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();
  private readonly now: () => number;

  constructor(opts?: { now?: () => number }) {
    this.now = opts?.now ?? Date.now;
  }

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  get size(): number {
    return this.store.size;
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    const expiresAtMs = opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null;
    this.store.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  expire(key: string, ttlSeconds: number): Promise<void> {
    const entry = this.getEntry(key);
    if (entry) entry.expiresAtMs = this.now() + ttlSeconds * 1000;
    return Promise.resolve();
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.store.clear();
    return Promise.resolve();
  }
}
