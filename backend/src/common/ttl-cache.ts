/**
 * TTL CACHE
 * =========
 *
 * In-memory cache with a per-entry TTL and an injectable clock.
 * Holds per-fixture statistics; the TTL tier comes from fixture status.
 */

import { systemClock, type Clock } from './clock.js';

type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

export interface TtlCacheStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: number; // percent
}

export class TtlCache<T> {
  private readonly map = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly defaultTtlMs: number,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Value if present and not expired; expired entries are dropped on read.
   */
  get(key: string): T | null {
    const e = this.map.get(key);
    if (!e) {
      this.misses++;
      return null;
    }
    if (this.clock.now() > e.expiresAt) {
      this.map.delete(key);
      this.misses++;
      return null;
    }
    this.hits++;
    return e.value;
  }

  set(key: string, value: T, ttlMs?: number): void {
    this.map.set(key, {
      value,
      expiresAt: this.clock.now() + (ttlMs ?? this.defaultTtlMs),
    });
  }

  stats(): TtlCacheStats {
    return {
      size: this.map.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: this.hits + this.misses > 0
        ? Math.round((this.hits / (this.hits + this.misses)) * 100)
        : 0,
    };
  }

  /**
   * Drops expired entries, returns how many.
   */
  prune(): number {
    const now = this.clock.now();
    let pruned = 0;
    for (const [k, e] of this.map.entries()) {
      if (now > e.expiresAt) {
        this.map.delete(k);
        pruned++;
      }
    }
    return pruned;
  }
}
