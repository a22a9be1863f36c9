import type { Location, Pollutant, TimeWindow } from "../types/air-quality";

/**
 * Read-through cache the query service computes joint series through.
 * Implementations may be remote, hence the promise.
 */
export interface ReadThroughCache<T> {
  getOrCompute(key: string, compute: () => T | Promise<T>): Promise<T>;
  clear(): void;
}

export function seriesCacheKey(
  location: Location,
  pollutant: Pollutant,
  window: TimeWindow
): string {
  return `${location.lat.toFixed(5)},${location.lon.toFixed(5)}|${pollutant}|${window.start}-${window.end}`;
}

interface Entry<T> {
  value: T;
  storedAt: number;
}

export const DEFAULT_CACHE_LIFETIME = 5 * 60 * 1000; // 5 minutes

/**
 * In-process TTL cache. Concurrent callers for the same key share one
 * in-flight computation; a rejected computation is not stored. Expired
 * entries are dropped whenever a new value is stored.
 */
export class TtlCache<T> implements ReadThroughCache<T> {
  private readonly entries = new Map<string, Entry<T>>();
  private readonly inFlight = new Map<string, Promise<T>>();

  constructor(
    private readonly ttlMs: number = DEFAULT_CACHE_LIFETIME,
    private readonly now: () => number = Date.now
  ) {
    if (!(ttlMs >= 0)) {
      throw new RangeError(`cache ttl must be >= 0, got ${ttlMs}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  async getOrCompute(key: string, compute: () => T | Promise<T>): Promise<T> {
    const entry = this.entries.get(key);
    if (entry) {
      if (this.isFresh(entry)) return entry.value;
      this.entries.delete(key);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const computation = Promise.resolve()
      .then(compute)
      .then((value) => {
        this.evictExpired();
        this.entries.set(key, { value, storedAt: this.now() });
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, computation);
    return computation;
  }

  clear(): void {
    this.entries.clear();
  }

  private isFresh(entry: Entry<T>): boolean {
    return this.now() - entry.storedAt < this.ttlMs;
  }

  // Keys carry free-form windows, so stale ones would otherwise pile up
  private evictExpired(): void {
    for (const [key, entry] of this.entries) {
      if (!this.isFresh(entry)) this.entries.delete(key);
    }
  }
}
