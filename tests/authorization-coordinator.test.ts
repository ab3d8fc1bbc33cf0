/**
 * Unit Tests for AuthorizationCoordinator
 */

import { Permission } from "../src/domain/entities/Permission";
import { Role } from "../src/domain/entities/Role";
import { DecisionSource } from "../src/modules/iam/types/authorization";
import { ValidationError } from "../src/shared/errors";
import {
  TestContext,
  buildPolicy,
  buildPrincipal,
  createTestContext,
  seedEditor,
} from "./utils/test-helpers";

describe("AuthorizationCoordinator", () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = createTestContext();
    await seedEditor(ctx.store, {
      id: "u1",
      attributes: { department: "Engineering" },
      relationships: [{ targetPrincipalId: "u2", relationshipType: "manager" }],
    });
  });

  describe("RBAC", () => {
    it("should allow through the permission closure without context", async () => {
      const decision = await ctx.coordinator.authorize("u1", "documents", "edit", null);
      expect(decision).toEqual({
        isAllowed: true,
        reason: "Granted by permission documents:edit",
        decisionSource: DecisionSource.PERMISSION,
      });
    });

    it("should deny with source None when the permission is missing", async () => {
      const decision = await ctx.coordinator.authorize("u1", "documents", "delete");
      expect(decision).toEqual({
        isAllowed: false,
        reason: "No permission documents:delete",
        decisionSource: DecisionSource.NONE,
      });
    });

    it("should deny an unknown principal", async () => {
      const decision = await ctx.coordinator.authorize("ghost", "documents", "edit");
      expect(decision.isAllowed).toBe(false);
      expect(decision.decisionSource).toBe(DecisionSource.NONE);
    });

    it("should deny after the granting role is removed", async () => {
      expect(await ctx.coordinator.hasPermission("u1", "documents", "edit")).toBe(true);

      await ctx.store.removeRole("u1", "role-editor");
      await ctx.coordinator.invalidate("u1");

      const decision = await ctx.coordinator.authorize("u1", "documents", "edit");
      expect(decision.isAllowed).toBe(false);
    });

    it("should reject empty identifiers", async () => {
      await expect(ctx.coordinator.authorize("", "documents", "edit")).rejects.toThrow(
        ValidationError,
      );
      await expect(ctx.coordinator.authorize("u1", " ", "edit")).rejects.toThrow(
        "resource is required",
      );
    });
  });

  describe("policies", () => {
    beforeEach(async () => {
      await ctx.store.savePolicy(
        buildPolicy({
          id: "deny-confidential",
          name: "Deny confidential edits",
          effect: "Deny",
          priority: 500,
          conditions: { classification: "Confidential" },
        }),
      );
    });

    it("should deny by policy when its condition matches", async () => {
      const decision = await ctx.coordinator.authorize("u1", "documents", "edit", {
        classification: "Confidential",
      });
      expect(decision).toEqual({
        isAllowed: false,
        reason: "Deny confidential edits",
        decisionSource: DecisionSource.POLICY,
        policyId: "deny-confidential",
      });
    });

    it("should ignore changes to a policy instance after it was saved", async () => {
      const saved = buildPolicy({
        id: "deny-drafts",
        name: "Deny draft edits",
        effect: "Deny",
        priority: 400,
        conditions: { status: "draft" },
      });
      await ctx.store.savePolicy(saved);
      saved.deactivate();

      for (const stored of await ctx.store.findActiveFor("documents", "edit")) {
        stored.deactivate();
      }

      const decision = await ctx.coordinator.authorize("u1", "documents", "edit", {
        status: "draft",
      });
      expect(decision).toEqual({
        isAllowed: false,
        reason: "Deny draft edits",
        decisionSource: DecisionSource.POLICY,
        policyId: "deny-drafts",
      });
    });

    it("should fall back to RBAC when no policy matches", async () => {
      const decision = await ctx.coordinator.authorize("u1", "documents", "edit", {
        classification: "Public",
      });
      expect(decision.isAllowed).toBe(true);
      expect(decision.decisionSource).toBe(DecisionSource.PERMISSION);
    });

    it("should skip policies for an empty context", async () => {
      const decision = await ctx.coordinator.authorize("u1", "documents", "edit", {});
      expect(decision.decisionSource).toBe(DecisionSource.PERMISSION);
    });

    it("should let principal attributes override caller context", async () => {
      await ctx.store.savePolicy(
        buildPolicy({
          id: "allow-engineering",
          name: "Engineering may edit",
          resource: "designs",
          priority: 10,
          conditions: { department: "Engineering", "principalId.eq": "u1" },
        }),
      );

      const decision = await ctx.coordinator.authorize("u1", "designs", "edit", {
        department: "Sales",
      });
      expect(decision.decisionSource).toBe(DecisionSource.POLICY);
      expect(decision.isAllowed).toBe(true);
    });
  });

  describe("time-range policies", () => {
    beforeEach(async () => {
      await ctx.store.savePolicy(
        buildPolicy({
          id: "support-hours",
          name: "Support hours",
          resource: "support",
          action: "access",
          conditions: { $timeRange: { start: "09:00", end: "17:00" } },
        }),
      );
    });

    it("should allow inside the window", async () => {
      ctx.clock.set("2024-06-03T10:00:00.000Z");
      const decision = await ctx.coordinator.authorize("u1", "support", "access", {
        channel: "web",
      });
      expect(decision).toEqual({
        isAllowed: true,
        reason: "Support hours",
        decisionSource: DecisionSource.POLICY,
        policyId: "support-hours",
      });
    });

    it("should fall back to RBAC outside the window", async () => {
      ctx.clock.set("2024-06-03T20:00:00.000Z");
      const decision = await ctx.coordinator.authorize("u1", "support", "access", {
        channel: "web",
      });
      expect(decision).toEqual({
        isAllowed: false,
        reason: "No permission support:access",
        decisionSource: DecisionSource.NONE,
      });
    });
  });

  describe("permission queries", () => {
    it("should list the sorted closure", async () => {
      await ctx.store.savePermission(new Permission("perm-doc-view", "documents", "view"));
      await ctx.store.grantPermission("role-editor", "perm-doc-view");

      expect(await ctx.coordinator.getPermissions("u1")).toEqual([
        "documents:edit",
        "documents:view",
      ]);
    });

    it("should not count permissions of an inactive role", async () => {
      await ctx.store.saveRole(new Role("role-editor", "Editor", ["perm-doc-edit"], false));
      expect(await ctx.coordinator.hasPermission("u1", "documents", "edit")).toBe(false);
    });
  });

  describe("relationships", () => {
    it("should answer relationship queries", async () => {
      expect(await ctx.coordinator.hasRelationship("u1", "u2", "manager")).toBe(true);
      expect(await ctx.coordinator.hasRelationship("u1", "u2", "peer")).toBe(false);
    });

    it("should express relationships as decisions", async () => {
      await ctx.store.save(buildPrincipal({ id: "u2", email: "bob@example.com" }));

      expect(await ctx.coordinator.authorizeRelationship("u1", "u2", "manager")).toEqual({
        isAllowed: true,
        reason: "Relationship manager to u2",
        decisionSource: DecisionSource.RELATIONSHIP,
      });
      expect(
        (await ctx.coordinator.authorizeRelationship("u2", "u1", "manager")).isAllowed,
      ).toBe(false);
    });
  });
});
