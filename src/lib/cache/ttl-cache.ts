import type { Clock } from "@/lib/clock";

type Entry<V> = {
  value: V;
  expiresAt: number;
};

export type TtlCacheOptions = {
  ttlMs: number;
  clock: Clock;
  /** Oldest entries are evicted first once this is exceeded. */
  maxEntries?: number;
};

/**
 * Process-wide key/value cache with a fixed freshness window.
 *
 * Entries are never mutated after insertion. Expired entries are dropped on
 * read; there is no background sweep.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, Entry<V>>();
  private readonly inFlight = new Map<string, Promise<V | undefined>>();
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly maxEntries: number;

  constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.clock = options.clock;
    this.maxEntries = options.maxEntries ?? Number.POSITIVE_INFINITY;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.clock.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: V): void {
    if (this.ttlMs <= 0) {
      return;
    }

    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.clock.now() + this.ttlMs });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  /**
   * Return the fresh value for `key`, or run `loader` to produce one.
   * Concurrent callers for the same key share a single load. A loader that
   * resolves to undefined or rejects leaves nothing cached.
   */
  async getOrLoad(key: string, loader: () => Promise<V | undefined>): Promise<V | undefined> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const load = (async () => {
      try {
        const value = await loader();
        if (value !== undefined) {
          this.set(key, value);
        }
        return value;
      } finally {
        this.inFlight.delete(key);
      }
    })();

    this.inFlight.set(key, load);
    return load;
  }
}

export const cacheKey = (...parts: string[]): string => JSON.stringify(parts);
