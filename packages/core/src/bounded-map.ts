/**
 * Bounded Map with TTL and LRU eviction
 *
 * Backs the trigger gate's dedup memory so it cannot grow for the lifetime
 * of the process: entries expire after `ttlMs`, and once `maxSize` is reached
 * the least recently touched entry makes room for the new one.
 */

import type { Clock } from "./types.js";

export type BoundedMapOptions<K, V> = {
  /** Maximum number of entries */
  maxSize: number;
  /** Optional TTL in ms, measured from insertion */
  ttlMs?: number;
  /** Optional callback when entries are evicted or expire */
  onEvict?: (key: K, value: V) => void;
  clock?: Clock;
};

export type BoundedMapStats = {
  size: number;
  maxSize: number;
  evictionCount: number;
  expiredCount: number;
};

type Entry<V> = {
  value: V;
  createTs: number;
};

export class BoundedMap<K, V> {
  // Map iteration order doubles as LRU order: touched entries are re-inserted at the end.
  private map = new Map<K, Entry<V>>();
  private evictionCount = 0;
  private expiredCount = 0;
  private readonly clock: Clock;

  constructor(private readonly options: BoundedMapOptions<K, V>) {
    if (options.maxSize <= 0) {
      throw new RangeError("maxSize must be positive");
    }
    this.clock = options.clock ?? Date.now;
  }

  set(key: K, value: V): this {
    const now = this.clock();
    const existing = this.map.get(key);

    if (existing) {
      this.map.delete(key);
      this.map.set(key, { value, createTs: existing.createTs });
      return this;
    }

    this.purgeExpired(now);
    if (this.map.size >= this.options.maxSize) {
      this.evictOldest();
    }

    this.map.set(key, { value, createTs: now });
    return this;
  }

  get(key: K): V | undefined {
    const entry = this.live(key);
    if (!entry) return undefined;

    this.map.delete(key);
    this.map.set(key, entry);
    return entry.value;
  }

  has(key: K): boolean {
    return this.live(key) !== undefined;
  }

  get size(): number {
    return this.map.size;
  }

  getStats(): BoundedMapStats {
    return {
      size: this.map.size,
      maxSize: this.options.maxSize,
      evictionCount: this.evictionCount,
      expiredCount: this.expiredCount,
    };
  }

  /** Drop every expired entry. Returns how many were removed. */
  purgeExpired(now: number = this.clock()): number {
    if (!this.options.ttlMs) return 0;

    let removed = 0;
    for (const [key, entry] of this.map) {
      if (now - entry.createTs > this.options.ttlMs) {
        this.expire(key, entry);
        removed++;
      }
    }
    return removed;
  }

  private live(key: K): Entry<V> | undefined {
    const entry = this.map.get(key);
    if (!entry) return undefined;

    if (this.options.ttlMs && this.clock() - entry.createTs > this.options.ttlMs) {
      this.expire(key, entry);
      return undefined;
    }
    return entry;
  }

  private expire(key: K, entry: Entry<V>): void {
    this.map.delete(key);
    this.expiredCount++;
    this.options.onEvict?.(key, entry.value);
  }

  private evictOldest(): void {
    const oldest = this.map.entries().next();
    if (oldest.done) return;

    const [key, entry] = oldest.value;
    this.map.delete(key);
    this.evictionCount++;
    this.options.onEvict?.(key, entry.value);
  }
}
