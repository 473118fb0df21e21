interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

/**
 * Explicit time-to-live cache. Entries older than `ttlMs` are evicted on
 * read, and every write sweeps out the expired ones.
 */
export class TtlCache<T> {
  private entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  private expired(entry: CacheEntry<T>, now: number): boolean {
    return now - entry.storedAt >= this.ttlMs;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.expired(entry, this.now())) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    const now = this.now();
    for (const [k, entry] of this.entries) {
      if (this.expired(entry, now)) this.entries.delete(k);
    }
    this.entries.set(key, { value, storedAt: now });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
