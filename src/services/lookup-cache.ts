interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * In-memory TTL cache for geolocation lookups.
 * Lives for the process lifetime only; a TTL of 0 disables caching.
 *
 * Every entry gets the same TTL, so insertion order is expiry order and
 * expired entries are swept from the front on each write.
 */
export class LookupCache<T> {
  private entries: Map<string, CacheEntry<T>> = new Map();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: T): void {
    if (this.ttlMs <= 0) {
      return;
    }

    const now = this.now();
    this.sweep(now);
    // Re-insert so the entry moves to the back of the expiry order
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: now + this.ttlMs });
  }

  get size(): number {
    return this.entries.size;
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (now < entry.expiresAt) {
        break;
      }
      this.entries.delete(key);
    }
  }
}
