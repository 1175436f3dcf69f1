import type { RepoRef } from './types.js';

export interface CacheEntry<V> {
  key: string;
  value: V;
  /** Monotonic; bumped on every read and write of the key. */
  recency: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  capacity: number;
}

/**
 * Process-local LRU store shared by all requests.
 *
 * Every method runs to completion without awaiting, so on the event loop each
 * get/put is its own critical section and recency bookkeeping cannot
 * interleave. Identical misses racing each other both compute and both put;
 * the later put wins.
 */
export class ResultCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private clock = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(readonly capacity: number) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    this.touch(entry);
    this.hits++;
    return entry.value;
  }

  put(key: string, value: V): void {
    if (this.capacity <= 0) return;

    const existing = this.entries.get(key);
    if (existing) {
      existing.value = value;
      this.touch(existing);
      return;
    }

    while (this.entries.size >= this.capacity) {
      this.evictLeastRecent();
    }
    this.entries.set(key, { key, value, recency: ++this.clock });
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size,
      capacity: this.capacity,
    };
  }

  // Re-inserting keeps Map iteration order equal to recency order.
  private touch(entry: CacheEntry<V>): void {
    entry.recency = ++this.clock;
    this.entries.delete(entry.key);
    this.entries.set(entry.key, entry);
  }

  private evictLeastRecent(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) return;
    this.entries.delete(oldest.value);
    this.evictions++;
  }
}

/** GitHub owner and repository names are case-insensitive; refs are not. */
export function repoCacheKey(ref: RepoRef): string {
  const base = `${ref.owner}/${ref.repo}`.toLowerCase();
  return ref.ref ? `${base}@${ref.ref}` : base;
}
