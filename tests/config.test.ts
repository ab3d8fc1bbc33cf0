/**
 * Unit Tests for configuration loading
 */

import { loadConfig } from "../src/shared/config";
import { ValidationError } from "../src/shared/errors";

describe("loadConfig", () => {
  it("should apply defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      nodeEnv: "development",
      port: 3000,
      logLevel: "info",
      jsonLogFormat: false,
      jwtIssuer: "access-service",
      jwtAudience: "access-clients",
      accessTokenTtl: "15m",
      refreshTokenTtl: "7d",
      maxLoginAttempts: 5,
      lockoutDurationMinutes: 30,
      permissionCacheTtlSeconds: 900,
      redisCircuitBreakerSuccessThreshold: 2,
      retryMaxAttempts: 3,
    });
    expect(config.redisUrl).toBeUndefined();
    expect(config.jwtSecret.length).toBeGreaterThan(0);
  });

  it("should parse typed values", () => {
    const config = loadConfig({
      PORT: "8080",
      JSON_LOG_FORMAT: "true",
      LOG_LEVEL: "debug",
      MAX_LOGIN_ATTEMPTS: "3",
      LOCKOUT_DURATION_MINUTES: "10",
      REDIS_URL: "redis://localhost:6379",
    });

    expect(config.port).toBe(8080);
    expect(config.jsonLogFormat).toBe(true);
    expect(config.logLevel).toBe("debug");
    expect(config.maxLoginAttempts).toBe(3);
    expect(config.lockoutDurationMinutes).toBe(10);
    expect(config.redisUrl).toBe("redis://localhost:6379");
  });

  it("should treat an empty REDIS_URL as unset", () => {
    expect(loadConfig({ REDIS_URL: "" }).redisUrl).toBeUndefined();
  });

  it("should read an optional seed file path", () => {
    expect(loadConfig({}).seedFile).toBeUndefined();
    expect(loadConfig({ SEED_FILE: "seed/demo.json" }).seedFile).toBe("seed/demo.json");
  });

  it("should list every invalid key", () => {
    try {
      loadConfig({ MAX_LOGIN_ATTEMPTS: "0", ACCESS_TOKEN_TTL: "soon" });
      throw new Error("expected loadConfig to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.message).toBe(
        "Invalid configuration: ACCESS_TOKEN_TTL, MAX_LOGIN_ATTEMPTS",
      );
    }
  });

  it("should reject weak secrets in production", () => {
    expect(() => loadConfig({ NODE_ENV: "production" })).toThrow(
      "Invalid configuration: JWT_SECRET",
    );
    expect(() =>
      loadConfig({ NODE_ENV: "production", JWT_SECRET: "please-change-me-now" }),
    ).toThrow(ValidationError);
    expect(
      loadConfig({ NODE_ENV: "production", JWT_SECRET: "test-signing-key-long-enough" }).jwtSecret,
    ).toBe("test-signing-key-long-enough");
  });
});
