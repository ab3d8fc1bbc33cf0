/**
 * Unit Tests for TokenService
 */

import jwt from "jsonwebtoken";
import { TokenService } from "../src/modules/auth/services/TokenService";
import { AuthenticationError, ErrorCode } from "../src/shared/errors";
import { TEST_SECRET } from "./utils/test-helpers";

describe("TokenService", () => {
  const config = {
    secret: TEST_SECRET,
    issuer: "test-issuer",
    audience: "test-audience",
    accessTokenTtl: "15m",
  };
  const service = new TokenService(config);
  const now = new Date("2024-06-03T10:00:00.000Z");
  const claims = {
    sub: "p1",
    email: "alice@example.com",
    roles: ["role-editor"],
    permissions: ["documents:edit"],
  };

  const expectAuthError = (fn: () => unknown, code: ErrorCode) => {
    try {
      fn();
    } catch (error) {
      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error instanceof AuthenticationError && error.code).toBe(code);
      return;
    }
    throw new Error("Expected an AuthenticationError");
  };

  it("should issue a token that verifies at the same instant", () => {
    const issued = service.issueAccessToken(claims, now);

    expect(issued.expiresIn).toBe(900);
    expect(issued.expiresAt).toEqual(new Date("2024-06-03T10:15:00.000Z"));

    const verified = service.verifyAccessToken(issued.token, now);
    expect(verified).toEqual({
      ...claims,
      jti: issued.jti,
      issuedAt: now,
      expiresAt: issued.expiresAt,
    });
  });

  it("should sign with HS256 and carry issuer and audience", () => {
    const issued = service.issueAccessToken(claims, now);
    const decoded = jwt.decode(issued.token, { complete: true });

    expect(decoded?.header.alg).toBe("HS256");
    expect(decoded?.payload).toMatchObject({
      sub: "p1",
      iss: "test-issuer",
      aud: "test-audience",
      jti: issued.jti,
      iat: 1717408800,
      exp: 1717409700,
    });
  });

  it("should reject an expired token against the supplied clock", () => {
    const issued = service.issueAccessToken(claims, now);
    expectAuthError(
      () => service.verifyAccessToken(issued.token, new Date("2024-06-03T10:15:00.000Z")),
      ErrorCode.TOKEN_EXPIRED,
    );
  });

  it("should reject tokens signed with another secret or audience", () => {
    const other = new TokenService({ ...config, secret: "other-secret" });
    expectAuthError(
      () => service.verifyAccessToken(other.issueAccessToken(claims, now).token, now),
      ErrorCode.TOKEN_INVALID,
    );

    const foreign = new TokenService({ ...config, audience: "someone-else" });
    expectAuthError(
      () => service.verifyAccessToken(foreign.issueAccessToken(claims, now).token, now),
      ErrorCode.TOKEN_INVALID,
    );
  });

  it("should reject garbage and tokens missing claims", () => {
    expectAuthError(() => service.verifyAccessToken("not.a.jwt", now), ErrorCode.TOKEN_INVALID);

    const bare = jwt.sign(
      { sub: "p1", iat: 1717408800, exp: 1717409700 },
      TEST_SECRET,
      { algorithm: "HS256", issuer: "test-issuer", audience: "test-audience", jwtid: "j1" },
    );
    expectAuthError(() => service.verifyAccessToken(bare, now), ErrorCode.TOKEN_INVALID);
  });

  it("should refuse an empty secret or a bad duration", () => {
    expect(() => new TokenService({ ...config, secret: "" })).toThrow(
      "Token signing secret is required",
    );
    expect(() => new TokenService({ ...config, accessTokenTtl: "15 minutes" })).toThrow(
      RangeError,
    );
  });
});
