/**
 * Unit Tests for Policy Entity
 */

import {
  Policy,
  PolicyEffect,
  parseEffect,
} from "../../src/modules/iam/policy/models/Policy";
import { ValidationError } from "../../src/shared/errors";

describe("Policy Entity", () => {
  const props = {
    id: "policy-1",
    name: "Finance approvals",
    resource: "invoices",
    action: "approve",
    effect: "allow",
  };

  describe("creation", () => {
    it("should normalize the effect and default optional fields", () => {
      const policy = new Policy(props);

      expect(policy.effect).toBe(PolicyEffect.ALLOW);
      expect(policy.priority).toBe(0);
      expect(policy.isActive).toBe(true);
      expect(policy.description).toBe("");
      expect(policy.condition).toEqual({ kind: "And", children: [] });
    });

    it("should parse conditions once at construction", () => {
      const policy = new Policy({ ...props, conditions: { "amount.lt": 500 } });
      expect(policy.condition).toEqual({
        kind: "Compare",
        field: "amount",
        op: "lt",
        expected: 500,
      });
      expect(policy.rawConditions).toEqual({ "amount.lt": 500 });
    });

    it("should keep its own copy of the conditions", () => {
      const conditions = { department: "Finance" };
      const policy = new Policy({ ...props, conditions });
      conditions.department = "Sales";

      const copy = policy.clone();
      copy.deactivate();

      expect(policy.rawConditions).toEqual({ department: "Finance" });
      expect(copy.rawConditions).toEqual({ department: "Finance" });
      expect(policy.isActive).toBe(true);
      expect(copy.effect).toBe(PolicyEffect.ALLOW);
    });

    it("should reject a malformed condition shape", () => {
      expect(
        () => new Policy({ ...props, conditions: { $or: "not-a-list" } }),
      ).toThrow(ValidationError);
    });

    it("should validate required fields and priority", () => {
      expect(() => new Policy({ ...props, name: " " })).toThrow("Policy name is required");
      expect(() => new Policy({ ...props, resource: "" })).toThrow(
        "Policy resource is required",
      );
      expect(() => new Policy({ ...props, priority: 1.5 })).toThrow(
        "Policy priority must be an integer",
      );
      expect(() => new Policy({ ...props, effect: "Maybe" })).toThrow(
        'Invalid policy effect "Maybe"',
      );
    });
  });

  describe("applicability", () => {
    it("should apply to its exact resource and action", () => {
      const policy = new Policy(props);
      expect(policy.appliesTo("invoices", "approve")).toBe(true);
      expect(policy.appliesTo("invoices", "view")).toBe(false);
      expect(policy.appliesTo("orders", "approve")).toBe(false);
    });

    it("should apply to every action with the wildcard", () => {
      const policy = new Policy({ ...props, action: "*" });
      expect(policy.appliesTo("invoices", "delete")).toBe(true);
      expect(policy.appliesTo("orders", "delete")).toBe(false);
    });

    it("should toggle activation", () => {
      const policy = new Policy({ ...props, isActive: false });
      expect(policy.isActive).toBe(false);
      policy.activate();
      expect(policy.isActive).toBe(true);
    });
  });

  it("parseEffect should be case-insensitive", () => {
    expect(parseEffect(" DENY ")).toBe(PolicyEffect.DENY);
    expect(parseEffect("Allow")).toBe(PolicyEffect.ALLOW);
  });
});
