import { ClockSource, systemClock } from "../../shared/clock";
import { IDistributedCache } from "./IDistributedCache";

interface CacheEntry {
  payload: string;
  expiresAt: number;
}

/**
 * Process-local cache used when no Redis URL is configured. Values are
 * stored serialized so callers never share references with the cache.
 */
export class InMemoryCache implements IDistributedCache {
  private entries = new Map<string, CacheEntry>();

  constructor(private readonly clock: ClockSource = systemClock) {}

  async get(key: string): Promise<unknown> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.clock.now().getTime()) {
      this.entries.delete(key);
      return null;
    }
    const value: unknown = JSON.parse(entry.payload);
    return value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.entries.set(key, {
      payload: JSON.stringify(value),
      expiresAt: this.clock.now().getTime() + ttlSeconds * 1000,
    });
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async removeByPrefix(prefix: string): Promise<number> {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
