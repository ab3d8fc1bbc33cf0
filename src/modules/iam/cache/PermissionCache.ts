/**
 * Permission Cache
 *
 * Cache-aside resolution of a principal's permission closure
 * (`resource:action` strings from every active role). A failing cache is
 * bypassed and the closure is recomputed from the store; nothing is ever
 * granted on missing data. Concurrent misses may recompute in parallel.
 */

import { z } from "zod";
import { IDistributedCache } from "../../../infrastructure/cache/IDistributedCache";
import { IPermissionRepository } from "../../../infrastructure/repositories/IPermissionRepository";
import { logger } from "../../../shared/logger";
import { RetryOptions, retryTransient } from "../../../shared/utils/retry";

export const PERMISSION_KEY_PREFIX = "principal_permissions:";

export const DEFAULT_PERMISSION_TTL_SECONDS = 15 * 60;

const cachedClosureSchema = z.array(z.string());

export interface PermissionCacheOptions {
  ttlSeconds?: number;
  retry?: Omit<RetryOptions, "signal">;
}

export class PermissionCache {
  private readonly ttlSeconds: number;
  private readonly retry: Omit<RetryOptions, "signal">;

  constructor(
    private readonly cache: IDistributedCache,
    private readonly permissions: IPermissionRepository,
    options: PermissionCacheOptions = {},
  ) {
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_PERMISSION_TTL_SECONDS;
    this.retry = options.retry ?? {};
  }

  static keyFor(principalId: string): string {
    return `${PERMISSION_KEY_PREFIX}${principalId}`;
  }

  async getPermissions(
    principalId: string,
    signal?: AbortSignal,
  ): Promise<ReadonlySet<string>> {
    const key = PermissionCache.keyFor(principalId);

    const cached = await this.readCache(key);
    if (cached) {
      return cached;
    }

    signal?.throwIfAborted();
    const closure = await retryTransient(
      () => this.permissions.findPermissionClosure(principalId, signal),
      "permissions.findPermissionClosure",
      { ...this.retry, signal },
    );

    await this.writeCache(key, closure);
    return new Set(closure);
  }

  async hasPermission(
    principalId: string,
    permissionKey: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const permissions = await this.getPermissions(principalId, signal);
    return permissions.has(permissionKey);
  }

  /**
   * Drop one principal's cached closure. Errors propagate: a stale
   * closure could keep a revoked grant alive until the TTL.
   */
  async invalidate(principalId: string): Promise<void> {
    await this.cache.remove(PermissionCache.keyFor(principalId));
    logger.debug("Permission cache invalidated", { principalId });
  }

  async invalidateMany(principalIds: readonly string[]): Promise<void> {
    for (const principalId of principalIds) {
      await this.invalidate(principalId);
    }
  }

  async invalidateAll(): Promise<number> {
    const removed = await this.cache.removeByPrefix(PERMISSION_KEY_PREFIX);
    logger.info("Permission cache cleared", { removed });
    return removed;
  }

  private async readCache(key: string): Promise<ReadonlySet<string> | null> {
    let raw: unknown;
    try {
      raw = await this.cache.get(key);
    } catch (error) {
      logger.warn("Permission cache read failed, recomputing", {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
    if (raw === null || raw === undefined) {
      return null;
    }

    const parsed = cachedClosureSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn("Ignoring malformed permission cache entry", { key });
      return null;
    }
    return new Set(parsed.data);
  }

  private async writeCache(key: string, closure: string[]): Promise<void> {
    try {
      await this.cache.set(key, closure, this.ttlSeconds);
    } catch (error) {
      logger.warn("Permission cache write failed", {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
