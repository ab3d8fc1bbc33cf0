/**
 * Unit Tests for Permission Entity
 */

import { Permission } from "../../src/domain/entities/Permission";
import { ValidationError } from "../../src/shared/errors";

describe("Permission Entity", () => {
  it("should expose the resource:action key", () => {
    const permission = new Permission("perm-1", " documents ", "edit", "Edit docs");
    expect(permission.resource).toBe("documents");
    expect(permission.key).toBe("documents:edit");
    expect(permission.toString()).toBe("documents:edit");
    expect(Permission.key("reports", "read")).toBe("reports:read");
  });

  it("should match on resource and action", () => {
    const permission = new Permission("perm-1", "documents", "edit");
    expect(permission.matches("documents", "edit")).toBe(true);
    expect(permission.matches("documents", "view")).toBe(false);
  });

  it("should reject missing fields and separators", () => {
    expect(() => new Permission("", "documents", "edit")).toThrow(ValidationError);
    expect(() => new Permission("perm-1", " ", "edit")).toThrow("Resource is required");
    expect(() => new Permission("perm-1", "documents", "")).toThrow("Action is required");
    expect(() => new Permission("perm-1", "doc:s", "edit")).toThrow(
      "Resource and action must not contain ':'",
    );
  });
});
