/**
 * Redis-backed distributed cache.
 *
 * Every command runs through a CircuitBreaker and, while the circuit is
 * closed, through retryTransient. Failures surface as
 * TransientInfrastructureError; an open circuit fails fast without retries.
 */

import { createClient } from "redis";
import { IDistributedCache } from "../cache/IDistributedCache";
import {
  CircuitBreaker,
  CircuitBreakerConfig,
  CircuitBreakerMetrics,
  CircuitOpenError,
  createDefaultConfig,
} from "./CircuitBreaker";
import { TransientInfrastructureError } from "../../shared/errors";
import { logger } from "../../shared/logger";
import { RetryOptions, retryTransient } from "../../shared/utils/retry";

/**
 * The subset of the node-redis client this service uses.
 */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  setEx(key: string, seconds: number, value: string): Promise<unknown>;
  del(keys: string[]): Promise<number>;
  scan(
    cursor: number,
    options: { MATCH: string; COUNT: number },
  ): Promise<{ cursor: number; keys: string[] }>;
  quit(): Promise<unknown>;
}

export interface RedisCacheConfig {
  keyPrefix?: string;
  scanCount?: number;
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  retry?: Omit<RetryOptions, "isRetryable" | "signal">;
}

export class RedisCacheService implements IDistributedCache {
  private readonly circuitBreaker: CircuitBreaker;
  private readonly keyPrefix: string;
  private readonly scanCount: number;
  private readonly retry: RetryOptions;

  constructor(
    private readonly client: RedisCacheClient,
    config: RedisCacheConfig = {},
  ) {
    this.circuitBreaker = new CircuitBreaker({
      ...createDefaultConfig(),
      name: "redis",
      ...config.circuitBreaker,
    });
    this.keyPrefix = config.keyPrefix ?? "";
    this.scanCount = config.scanCount ?? 100;
    this.retry = {
      ...config.retry,
      isRetryable: (error) =>
        error instanceof TransientInfrastructureError &&
        !(error.cause instanceof CircuitOpenError),
    };
  }

  /**
   * Connect a node-redis client and wrap it.
   */
  static async connect(
    url: string,
    config: RedisCacheConfig = {},
  ): Promise<RedisCacheService> {
    const client = createClient({ url });
    client.on("error", (err: unknown) => {
      logger.error("Redis client error", {
        error: err instanceof Error ? err.message : String(err),
      });
    });
    client.on("reconnecting", () => {
      logger.info("Redis client reconnecting");
    });

    await client.connect();
    logger.info("Redis connection established");

    return new RedisCacheService(
      {
        get: (key) => client.get(key),
        setEx: (key, seconds, value) => client.setEx(key, seconds, value),
        del: (keys) => client.del(keys),
        scan: (cursor, options) => client.scan(cursor, options),
        quit: () => client.quit(),
      },
      config,
    );
  }

  async get(key: string): Promise<unknown> {
    const payload = await this.run("get", () =>
      this.client.get(this.keyFor(key)),
    );
    if (payload === null) {
      return null;
    }
    try {
      const value: unknown = JSON.parse(payload);
      return value;
    } catch (error) {
      logger.warn("Discarding unreadable cache entry", {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    const payload = JSON.stringify(value);
    await this.run("set", () =>
      this.client.setEx(this.keyFor(key), ttlSeconds, payload),
    );
  }

  async remove(key: string): Promise<void> {
    await this.run("del", () => this.client.del([this.keyFor(key)]));
  }

  async removeByPrefix(prefix: string): Promise<number> {
    const pattern = `${this.keyFor(prefix)}*`;
    return this.run("removeByPrefix", async () => {
      let removed = 0;
      let cursor = 0;
      do {
        const result = await this.client.scan(cursor, {
          MATCH: pattern,
          COUNT: this.scanCount,
        });
        cursor = result.cursor;
        if (result.keys.length > 0) {
          removed += await this.client.del(result.keys);
        }
      } while (cursor !== 0);
      return removed;
    });
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
    logger.info("Redis connection closed");
  }

  getCircuitMetrics(): CircuitBreakerMetrics {
    return this.circuitBreaker.getMetrics();
  }

  private keyFor(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private run<T>(operationName: string, operation: () => Promise<T>): Promise<T> {
    return retryTransient(
      async () => {
        try {
          return await this.circuitBreaker.execute(operation);
        } catch (error) {
          const message =
            error instanceof CircuitOpenError
              ? error.message
              : `Redis ${operationName} failed`;
          throw new TransientInfrastructureError(message, error);
        }
      },
      `redis.${operationName}`,
      this.retry,
    );
  }
}
