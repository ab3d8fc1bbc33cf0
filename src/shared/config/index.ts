import * as dotenv from "dotenv";
import { z } from "zod";
import { ValidationError } from "../errors/DomainErrors";
import { isDuration } from "../utils/duration";

// Load environment variables
dotenv.config();

export interface AppConfig {
  // Server
  nodeEnv: "development" | "test" | "production";
  port: number;

  // Logging
  logLevel: "error" | "warn" | "info" | "debug";
  jsonLogFormat: boolean;

  // JWT
  jwtSecret: string;
  jwtIssuer: string;
  jwtAudience: string;
  accessTokenTtl: string;
  refreshTokenTtl: string;

  // Account Lockout
  maxLoginAttempts: number;
  lockoutDurationMinutes: number;

  // Permission cache
  permissionCacheTtlSeconds: number;

  // Redis
  redisUrl?: string;
  redisCircuitBreakerFailureThreshold: number;
  redisCircuitBreakerRecoveryTimeoutMs: number;
  redisCircuitBreakerSuccessThreshold: number;
  redisCircuitBreakerMonitoringWindowMs: number;

  // Retry at the cache/store boundary
  retryMaxAttempts: number;
  retryInitialDelayMs: number;
  retryMaxDelayMs: number;

  // Password Hashing (Argon2)
  argon2MemoryCost: number;
  argon2TimeCost: number;
  argon2Parallelism: number;

  // Development data loaded at startup (ignored in production)
  seedFile?: string;
}

const DEVELOPMENT_JWT_SECRET = "development-only-jwt-secret";

const PLACEHOLDER_SECRET_PATTERNS = [
  "default",
  "change-in-production",
  "change-me",
  "development-only",
  "secret",
];

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const duration = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .refine(isDuration, { message: "Expected a duration such as 15m or 7d" });

const integer = (fallback: number, min: number, max?: number) => {
  const base = z.coerce.number().int().min(min);
  return (max === undefined ? base : base.max(max)).default(fallback);
};

const envSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),
    PORT: integer(3000, 1, 65535),
    LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
    JSON_LOG_FORMAT: booleanFlag,

    JWT_SECRET: optionalString,
    JWT_ISSUER: z.string().min(1).default("access-service"),
    JWT_AUDIENCE: z.string().min(1).default("access-clients"),
    ACCESS_TOKEN_TTL: duration("15m"),
    REFRESH_TOKEN_TTL: duration("7d"),

    MAX_LOGIN_ATTEMPTS: integer(5, 1, 100),
    LOCKOUT_DURATION_MINUTES: integer(30, 1, 1440),

    PERMISSION_CACHE_TTL_SECONDS: integer(900, 1),

    REDIS_URL: optionalString,
    REDIS_CIRCUIT_BREAKER_FAILURE_THRESHOLD: integer(5, 1),
    REDIS_CIRCUIT_BREAKER_RECOVERY_TIMEOUT_MS: integer(30000, 1000),
    REDIS_CIRCUIT_BREAKER_SUCCESS_THRESHOLD: integer(2, 1),
    REDIS_CIRCUIT_BREAKER_MONITORING_WINDOW_MS: integer(60000, 1000),

    RETRY_MAX_ATTEMPTS: integer(3, 1, 10),
    RETRY_INITIAL_DELAY_MS: integer(50, 0),
    RETRY_MAX_DELAY_MS: integer(1000, 0),

    ARGON2_MEMORY_COST: integer(65536, 1024),
    ARGON2_TIME_COST: integer(3, 1),
    ARGON2_PARALLELISM: integer(1, 1),

    SEED_FILE: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV !== "production") {
      return;
    }
    const secret = env.JWT_SECRET;
    if (!secret || secret.length < 16) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["JWT_SECRET"],
        message: "JWT_SECRET must be at least 16 characters in production",
      });
      return;
    }
    const lowered = secret.toLowerCase();
    if (PLACEHOLDER_SECRET_PATTERNS.some((p) => lowered.includes(p))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["JWT_SECRET"],
        message: "JWT_SECRET must not be a placeholder value in production",
      });
    }
  });

/**
 * Parse and validate configuration from an environment map.
 *
 * @throws ValidationError listing every invalid key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      key: issue.path.join("."),
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid configuration: ${issues.map((i) => i.key).join(", ")}`,
      { issues },
    );
  }

  const values = parsed.data;
  return {
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    jsonLogFormat: values.JSON_LOG_FORMAT,
    jwtSecret: values.JWT_SECRET ?? DEVELOPMENT_JWT_SECRET,
    jwtIssuer: values.JWT_ISSUER,
    jwtAudience: values.JWT_AUDIENCE,
    accessTokenTtl: values.ACCESS_TOKEN_TTL,
    refreshTokenTtl: values.REFRESH_TOKEN_TTL,
    maxLoginAttempts: values.MAX_LOGIN_ATTEMPTS,
    lockoutDurationMinutes: values.LOCKOUT_DURATION_MINUTES,
    permissionCacheTtlSeconds: values.PERMISSION_CACHE_TTL_SECONDS,
    redisUrl: values.REDIS_URL,
    redisCircuitBreakerFailureThreshold:
      values.REDIS_CIRCUIT_BREAKER_FAILURE_THRESHOLD,
    redisCircuitBreakerRecoveryTimeoutMs:
      values.REDIS_CIRCUIT_BREAKER_RECOVERY_TIMEOUT_MS,
    redisCircuitBreakerSuccessThreshold:
      values.REDIS_CIRCUIT_BREAKER_SUCCESS_THRESHOLD,
    redisCircuitBreakerMonitoringWindowMs:
      values.REDIS_CIRCUIT_BREAKER_MONITORING_WINDOW_MS,
    retryMaxAttempts: values.RETRY_MAX_ATTEMPTS,
    retryInitialDelayMs: values.RETRY_INITIAL_DELAY_MS,
    retryMaxDelayMs: values.RETRY_MAX_DELAY_MS,
    argon2MemoryCost: values.ARGON2_MEMORY_COST,
    argon2TimeCost: values.ARGON2_TIME_COST,
    argon2Parallelism: values.ARGON2_PARALLELISM,
    seedFile: values.SEED_FILE,
  };
}

const config: AppConfig = loadConfig();

export { config };
