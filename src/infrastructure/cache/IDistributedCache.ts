/**
 * Key/value cache with per-entry TTL. Values are JSON-serializable and
 * come back as `unknown`; readers validate what they get.
 */
export interface IDistributedCache {
  /** Null on a miss or an expired entry */
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  remove(key: string): Promise<void>;
  /** Returns the number of keys removed */
  removeByPrefix(prefix: string): Promise<number>;
}
