/**
 * Unit Tests for Principal Entity
 */

import { Principal } from "../../src/domain/entities/Principal";
import { Email } from "../../src/domain/value-objects/Email";
import { ValidationError } from "../../src/shared/errors";
import { buildPrincipal } from "../utils/test-helpers";

describe("Principal Entity", () => {
  const now = new Date("2024-06-03T10:00:00.000Z");

  it("should default to an active, unlocked principal", () => {
    const principal = buildPrincipal();
    expect(principal.isActive).toBe(true);
    expect(principal.isEmailVerified).toBe(false);
    expect(principal.failedLoginCount).toBe(0);
    expect(principal.lockedUntil).toBeNull();
    expect(principal.lastLoginAt).toBeNull();
    expect(principal.isLockedAt(now)).toBe(false);
  });

  it("should validate its invariants", () => {
    const email = new Email("alice@example.com");
    expect(() => new Principal({ id: "", email, passwordHash: "h" })).toThrow(
      "Principal ID is required",
    );
    expect(() => new Principal({ id: "p1", email, passwordHash: "" })).toThrow(
      ValidationError,
    );
    expect(
      () => new Principal({ id: "p1", email, passwordHash: "h", failedLoginCount: -1 }),
    ).toThrow("Failed login count must be >= 0");
  });

  it("should derive the lock from lockedUntil", () => {
    const principal = buildPrincipal({
      failedLoginCount: 5,
      lockedUntil: new Date("2024-06-03T10:30:00.000Z"),
    });
    expect(principal.isLockedAt(now)).toBe(true);
    expect(principal.isLockedAt(new Date("2024-06-03T10:30:00.000Z"))).toBe(false);
  });

  it("should apply lockout snapshots and record logins", () => {
    const principal = buildPrincipal({ failedLoginCount: 3 });
    principal.applyLockout({ failedLoginCount: 0, lockedUntil: null }, now);
    principal.recordLogin(now);

    expect(principal.lockoutSnapshot).toEqual({ failedLoginCount: 0, lockedUntil: null });
    expect(principal.lastLoginAt).toEqual(now);
    expect(principal.updatedAt).toEqual(now);
  });

  it("should manage roles without duplicates", () => {
    const principal = buildPrincipal({ roleIds: ["r1", "r1"] });
    expect(principal.roleIds).toEqual(["r1"]);
    principal.assignRole("r2");
    principal.assignRole("r2");
    principal.removeRole("r1");
    expect(principal.roleIds).toEqual(["r2"]);
    expect(principal.hasRole("r1")).toBe(false);
  });

  it("should manage attributes and relationships", () => {
    const principal = buildPrincipal({ attributes: { department: "HR" } });
    principal.setAttribute("level", "3");
    principal.addRelationship("p2", "manager");
    principal.addRelationship("p2", "manager");

    expect(principal.attributes).toEqual({ department: "HR", level: "3" });
    expect(principal.relationships).toEqual([
      { targetPrincipalId: "p2", relationshipType: "manager" },
    ]);
    expect(principal.hasRelationship("p2", "manager")).toBe(true);
    expect(principal.hasRelationship("p2", "peer")).toBe(false);
    expect(() => principal.setAttribute(" ", "x")).toThrow(ValidationError);
  });

  it("should clone into an independent copy", () => {
    const principal = buildPrincipal({ roleIds: ["r1"] });
    const copy = principal.clone();
    copy.assignRole("r2");
    copy.deactivate();

    expect(principal.roleIds).toEqual(["r1"]);
    expect(principal.isActive).toBe(true);
    expect(copy.email.value).toBe("alice@example.com");
  });
});
