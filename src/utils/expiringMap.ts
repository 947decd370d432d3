/**
 * Map with per-entry TTL and a size cap
 *
 * Backs the idempotency markers and cached dependency results. Entries are
 * evicted oldest-first once `maxEntries` is exceeded; `ttlMs` of 0 disables
 * expiry.
 */

interface Entry<V> {
  value: V;
  storedAt: number;
}

export interface ExpiringMapOptions {
  ttlMs: number;
  maxEntries: number;
  now?: () => number;
}

export class ExpiringMap<K, V> {
  private readonly entries = new Map<K, Entry<V>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: ExpiringMapOptions) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? Date.now;
  }

  set(key: K, value: V): void {
    // Re-insert so iteration order stays oldest-first
    this.entries.delete(key);
    this.entries.set(key, { value, storedAt: this.now() });

    if (this.maxEntries > 0) {
      while (this.entries.size > this.maxEntries) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
      }
    }
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  has(key: K): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return false;
    }
    return true;
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drop every expired entry; returns how many were removed
   */
  prune(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  keys(): K[] {
    this.prune();
    return Array.from(this.entries.keys());
  }

  get size(): number {
    this.prune();
    return this.entries.size;
  }

  private isExpired(entry: Entry<V>): boolean {
    return this.ttlMs > 0 && this.now() - entry.storedAt >= this.ttlMs;
  }
}
