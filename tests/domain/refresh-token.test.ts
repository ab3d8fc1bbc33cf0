/**
 * Unit Tests for RefreshToken Entity
 */

import { RefreshToken } from "../../src/domain/entities/RefreshToken";
import { ValidationError } from "../../src/shared/errors";

describe("RefreshToken Entity", () => {
  const createdAt = new Date("2024-06-03T10:00:00.000Z");
  const expiresAt = new Date("2024-06-10T10:00:00.000Z");
  const props = {
    id: "token-1",
    principalId: "p1",
    tokenHash: "abc123",
    familyId: "family-1",
    createdAt,
    expiresAt,
  };

  it("should be active until it expires", () => {
    const token = new RefreshToken(props);
    expect(token.isRevoked).toBe(false);
    expect(token.isActive(createdAt)).toBe(true);
    expect(token.isExpired(new Date("2024-06-10T09:59:59.999Z"))).toBe(false);
    expect(token.isExpired(expiresAt)).toBe(true);
    expect(token.isActive(expiresAt)).toBe(false);
  });

  it("should return a new revoked instance", () => {
    const token = new RefreshToken(props);
    const revokedAt = new Date("2024-06-04T00:00:00.000Z");
    const revoked = token.revoke(revokedAt, "token-2");

    expect(token.isRevoked).toBe(false);
    expect(revoked).not.toBe(token);
    expect(revoked.revokedAt).toEqual(revokedAt);
    expect(revoked.replacedByTokenId).toBe("token-2");
    expect(revoked.isActive(createdAt)).toBe(false);
  });

  it("should keep the first revocation", () => {
    const revoked = new RefreshToken(props).revoke(createdAt);
    expect(revoked.revoke(expiresAt, "token-3")).toBe(revoked);
    expect(revoked.replacedByTokenId).toBeNull();
  });

  it("should require expiry after creation", () => {
    expect(() => new RefreshToken({ ...props, expiresAt: createdAt })).toThrow(
      "Token must expire after it is created",
    );
    expect(() => new RefreshToken({ ...props, tokenHash: "" })).toThrow(ValidationError);
  });
});
