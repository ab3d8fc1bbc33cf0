import * as fs from "fs";
import * as path from "path";
import { createApp } from "./app";
import { AccountLockoutStateMachine } from "./domain/policies/AccountLockout";
import { IDistributedCache } from "./infrastructure/cache/IDistributedCache";
import { InMemoryCache } from "./infrastructure/cache/InMemoryCache";
import { RedisCacheService } from "./infrastructure/redis/RedisCacheService";
import { InMemoryStore } from "./infrastructure/repositories/memory/InMemoryStore";
import { seedStore } from "./infrastructure/repositories/memory/seed";
import { CredentialService } from "./modules/auth/services/CredentialService";
import { PasswordService } from "./modules/auth/services/PasswordService";
import { TokenService } from "./modules/auth/services/TokenService";
import { PermissionCache } from "./modules/iam/cache/PermissionCache";
import { AuthorizationCoordinator } from "./modules/iam/services/AuthorizationCoordinator";
import { systemClock } from "./shared/clock";
import { config } from "./shared/config";
import { logger } from "./shared/logger";
import { parseDuration } from "./shared/utils/duration";

async function start() {
  const retry = {
    maxAttempts: config.retryMaxAttempts,
    initialDelayMs: config.retryInitialDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
  };

  let redis: RedisCacheService | null = null;
  let cache: IDistributedCache;
  if (config.redisUrl) {
    redis = await RedisCacheService.connect(config.redisUrl, {
      retry,
      circuitBreaker: {
        failureThreshold: config.redisCircuitBreakerFailureThreshold,
        recoveryTimeout: config.redisCircuitBreakerRecoveryTimeoutMs,
        successThreshold: config.redisCircuitBreakerSuccessThreshold,
        monitoringWindow: config.redisCircuitBreakerMonitoringWindowMs,
      },
    });
    cache = redis;
  } else {
    logger.warn("REDIS_URL not set, using process-local permission cache");
    cache = new InMemoryCache(systemClock);
  }

  const store = new InMemoryStore();
  const permissionCache = new PermissionCache(cache, store, {
    ttlSeconds: config.permissionCacheTtlSeconds,
    retry,
  });
  store.setPermissionsChangedHook((principalIds) =>
    permissionCache.invalidateMany(principalIds),
  );

  const tokenSigner = new TokenService({
    secret: config.jwtSecret,
    issuer: config.jwtIssuer,
    audience: config.jwtAudience,
    accessTokenTtl: config.accessTokenTtl,
  });

  const passwordHasher = new PasswordService({
    memoryCost: config.argon2MemoryCost,
    timeCost: config.argon2TimeCost,
    parallelism: config.argon2Parallelism,
  });

  if (config.seedFile && config.nodeEnv === "production") {
    logger.warn("SEED_FILE is ignored in production");
  } else if (config.seedFile) {
    const seedPath = path.resolve(config.seedFile);
    const data: unknown = JSON.parse(fs.readFileSync(seedPath, "utf8"));
    const summary = await seedStore(store, data, passwordHasher, systemClock.now());
    logger.info("Seed data loaded", { file: seedPath, ...summary });
  }

  const credentialService = new CredentialService({
    principals: store,
    refreshTokens: store,
    permissionCache,
    passwordHasher,
    tokenSigner,
    lockout: new AccountLockoutStateMachine({
      maxAttempts: config.maxLoginAttempts,
      lockoutDurationMinutes: config.lockoutDurationMinutes,
    }),
    refreshTokenTtlSeconds: parseDuration(config.refreshTokenTtl),
    clock: systemClock,
    retry,
  });

  const coordinator = new AuthorizationCoordinator({
    policies: store,
    principals: store,
    permissionCache,
    clock: systemClock,
    retry,
  });

  const app = createApp({
    credentialService,
    coordinator,
    tokenSigner,
    clock: systemClock,
    trustProxy: config.nodeEnv === "production" ? 1 : undefined,
  });

  const server = app.listen(config.port, () => {
    logger.info(`Server is running on port ${config.port}`, {
      env: config.nodeEnv,
      cache: redis ? "redis" : "memory",
    });
  });

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    server.close();
    try {
      await redis?.disconnect();
      logger.info("All connections closed");
      process.exit(0);
    } catch (error) {
      logger.error("Error during shutdown", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
}

start().catch((error: unknown) => {
  logger.error("Server failed to start", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
