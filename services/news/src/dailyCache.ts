/**
 * Daily cache — one calendar day of results, keyed by option.
 *
 * Every resident entry belongs to the same cache day. A write for a different
 * day clears everything first, so the cache never mixes days. Random results
 * are not cacheable; the option type keeps them out.
 */

import type { CacheableOption, CacheEntry, CalendarDate } from "./types";

export type LoadResult = {
  entry: CacheEntry;
  cached: boolean;
};

export class DailyCache {
  private entries = new Map<CacheableOption, CacheEntry>();
  private cacheDay: CalendarDate | null = null;
  private inFlight = new Map<string, Promise<CacheEntry>>();

  get day(): CalendarDate | null {
    return this.cacheDay;
  }

  get size(): number {
    return this.entries.size;
  }

  get(day: CalendarDate, option: CacheableOption): CacheEntry | undefined {
    if (this.cacheDay !== day) return undefined;
    return this.entries.get(option);
  }

  has(day: CalendarDate, option: CacheableOption): boolean {
    return this.get(day, option) !== undefined;
  }

  put(day: CalendarDate, option: CacheableOption, entry: CacheEntry): void {
    if (this.cacheDay !== day) {
      if (this.cacheDay !== null) {
        console.log(
          `[news] cache rollover ${this.cacheDay} → ${day}, dropping ${this.entries.size} entries`
        );
      }
      this.entries.clear();
      this.cacheDay = day;
    }
    this.entries.set(option, entry);
  }

  clear(): void {
    this.entries.clear();
    this.cacheDay = null;
  }

  /**
   * Cached entry for (day, option), or the loader's result stored under it.
   * Concurrent misses for the same key share one loader call. A load that
   * finishes after the cache has moved on to a later day is returned but not
   * stored.
   */
  async getOrLoad(
    day: CalendarDate,
    option: CacheableOption,
    loader: () => Promise<CacheEntry>
  ): Promise<LoadResult> {
    const hit = this.get(day, option);
    if (hit !== undefined) return { entry: hit, cached: true };

    const key = `${day}:${option}`;
    const pending = this.inFlight.get(key);
    if (pending) return { entry: await pending, cached: false };

    const load = Promise.resolve()
      .then(loader)
      .then((entry) => {
        // ISO dates order lexically
        if (this.cacheDay === null || this.cacheDay <= day) {
          this.put(day, option, entry);
        }
        return entry;
      })
      .finally(() => this.inFlight.delete(key));
    this.inFlight.set(key, load);

    return { entry: await load, cached: false };
  }
}
