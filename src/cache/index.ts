/**
 * Fetch Cache Module
 *
 * Time-bounded FetchResult cache keyed by the exact URL string. The cache
 * is an explicit object handed to the Fetcher so tests can drive it with
 * their own clock. Only successful fetches are stored; a failed fetch is
 * retried for real the next time the URL is requested.
 */

import type { FetchResult, FetchSuccess } from '../types/index.js';

/** One hour */
export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

export const DEFAULT_CACHE_MAX_ENTRIES = 500;

export type Clock = () => number;

export interface FetchCacheOptions {
  /** Fetch window in milliseconds (default: one hour) */
  ttlMs?: number;
  /** Oldest entries are evicted past this size (default: 500) */
  maxEntries?: number;
  /** Millisecond clock (default: Date.now) */
  now?: Clock;
}

interface CacheEntry {
  result: FetchSuccess;
  expiresAt: number;
}

export class FetchCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<FetchResult>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: Clock;

  constructor(options: FetchCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  /**
   * Cached result for a URL, if one is still inside its fetch window
   */
  get(url: string): FetchSuccess | undefined {
    const entry = this.entries.get(url);
    if (!entry) {
      return undefined;
    }
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(url);
      return undefined;
    }
    return entry.result;
  }

  set(url: string, result: FetchSuccess): void {
    this.entries.delete(url);
    this.entries.set(url, { result, expiresAt: this.now() + this.ttlMs });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  /**
   * Return the cached result or run the loader once.
   * Callers asking for the same URL while a load is pending share it.
   */
  async getOrLoad(url: string, loader: () => Promise<FetchResult>): Promise<{ result: FetchResult; cached: boolean }> {
    const hit = this.get(url);
    if (hit) {
      return { result: hit, cached: true };
    }

    const pending = this.inFlight.get(url);
    if (pending) {
      return { result: await pending, cached: true };
    }

    const load = loader().then((result) => {
      if (result.success) {
        this.set(url, result);
      }
      return result;
    });
    this.inFlight.set(url, load);

    try {
      return { result: await load, cached: false };
    } finally {
      this.inFlight.delete(url);
    }
  }

  delete(url: string): void {
    this.entries.delete(url);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Number of stored entries, expired ones included until next read
   */
  size(): number {
    return this.entries.size;
  }
}
