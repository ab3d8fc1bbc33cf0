/**
 * Unit Tests for the development seed loader
 */

import * as fs from "fs";
import * as path from "path";
import { seedStore } from "../src/infrastructure/repositories/memory/seed";
import { DecisionSource } from "../src/modules/iam/types/authorization";
import { ValidationError } from "../src/shared/errors";
import { logger } from "../src/shared/logger";
import { TestContext, createTestContext } from "./utils/test-helpers";

const demoSeed: unknown = JSON.parse(
  fs.readFileSync(path.join(__dirname, "..", "seed", "demo.json"), "utf8"),
);

describe("seedStore", () => {
  let ctx: TestContext;

  beforeEach(() => {
    jest.spyOn(logger, "info").mockImplementation(() => undefined);
    ctx = createTestContext();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should load the demo data set", async () => {
    const summary = await seedStore(ctx.store, demoSeed, ctx.passwordHasher, ctx.clock.now());

    expect(summary).toEqual({ permissions: 3, roles: 3, principals: 2, policies: 2 });
    expect(await ctx.coordinator.getPermissions("demo-admin")).toEqual([
      "documents:edit",
      "documents:view",
      "invoices:approve",
    ]);
    expect(await ctx.coordinator.hasRelationship("demo-viewer", "demo-admin", "reports_to")).toBe(
      true,
    );
  });

  it("should hash seeded passwords so seeded principals can log in", async () => {
    await seedStore(ctx.store, demoSeed, ctx.passwordHasher, ctx.clock.now());

    const stored = await ctx.store.findByEmail("admin@example.com");
    expect(stored?.passwordHash).toBe("hashed:demo-password");

    const result = await ctx.credentialService.authenticate({
      email: "admin@example.com",
      password: "demo-password",
      ipAddress: "127.0.0.1",
      userAgent: "jest",
    });
    expect(result.ok).toBe(true);
  });

  it("should apply seeded policies with principal attributes", async () => {
    await seedStore(ctx.store, demoSeed, ctx.passwordHasher, ctx.clock.now());

    expect(
      await ctx.coordinator.authorize("demo-viewer", "invoices", "approve", { amount: 20000 }),
    ).toEqual({
      isAllowed: false,
      reason: "Large invoices need finance",
      decisionSource: DecisionSource.POLICY,
      policyId: "policy-large-invoices",
    });
    expect(
      await ctx.coordinator.authorize("demo-admin", "invoices", "approve", { amount: 20000 }),
    ).toEqual({
      isAllowed: true,
      reason: "Granted by permission invoices:approve",
      decisionSource: DecisionSource.PERMISSION,
    });
  });

  it("should reject data that does not match the schema", async () => {
    const invalid = { principals: [{ id: "p1", email: "a@example.com" }] };

    await expect(
      seedStore(ctx.store, invalid, ctx.passwordHasher, ctx.clock.now()),
    ).rejects.toThrow(ValidationError);
    await expect(
      seedStore(ctx.store, invalid, ctx.passwordHasher, ctx.clock.now()),
    ).rejects.toThrow("Invalid seed data");
  });
});
