/**
 * Authorization Integration Tests
 * Hybrid decisions and permission queries over HTTP
 */

import request from "supertest";
import { Express } from "express";
import { createApp } from "../../src/app";
import { ErrorCode } from "../../src/shared/errors";
import { DecisionSource } from "../../src/modules/iam/types/authorization";
import {
  TestContext,
  buildPolicy,
  buildPrincipal,
  createTestContext,
  seedEditor,
} from "../utils/test-helpers";

describe("Authorization Integration Tests", () => {
  let ctx: TestContext;
  let app: Express;

  beforeEach(async () => {
    ctx = createTestContext();
    await seedEditor(ctx.store, {
      id: "u1",
      relationships: [{ targetPrincipalId: "u2", relationshipType: "manager" }],
    });
    await ctx.store.save(buildPrincipal({ id: "u2", email: "bob@example.com" }));
    await ctx.store.savePolicy(
      buildPolicy({
        id: "deny-large-edits",
        name: "Large edits need review",
        effect: "Deny",
        priority: 100,
        conditions: { "size.gt": 1000 },
      }),
    );
    app = createApp({
      credentialService: ctx.credentialService,
      coordinator: ctx.coordinator,
      tokenSigner: ctx.tokenService,
      clock: ctx.clock,
    });
  });

  describe("POST /api/v1/authorize", () => {
    it("should allow through a granted permission", async () => {
      const response = await request(app)
        .post("/api/v1/authorize")
        .send({ principalId: "u1", resource: "documents", action: "edit" });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        isAllowed: true,
        reason: "Granted by permission documents:edit",
        decisionSource: DecisionSource.PERMISSION,
      });
    });

    it("should let a matching policy deny", async () => {
      const response = await request(app)
        .post("/api/v1/authorize")
        .send({
          principalId: "u1",
          resource: "documents",
          action: "edit",
          context: { size: 5000 },
        });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        isAllowed: false,
        reason: "Large edits need review",
        decisionSource: DecisionSource.POLICY,
        policyId: "deny-large-edits",
      });
    });

    it("should fall back to permissions when no policy matches", async () => {
      const response = await request(app)
        .post("/api/v1/authorize")
        .send({
          principalId: "u1",
          resource: "documents",
          action: "edit",
          context: { size: 10 },
        });

      expect(response.body.isAllowed).toBe(true);
      expect(response.body.decisionSource).toBe(DecisionSource.PERMISSION);
    });

    it("should deny without a grant", async () => {
      const response = await request(app)
        .post("/api/v1/authorize")
        .send({ principalId: "u2", resource: "documents", action: "edit" });

      expect(response.body).toEqual({
        isAllowed: false,
        reason: "No permission documents:edit",
        decisionSource: DecisionSource.NONE,
      });
    });

    it("should reject a request without a resource", async () => {
      const response = await request(app)
        .post("/api/v1/authorize")
        .send({ principalId: "u1", action: "edit" });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(response.body.details.issues).toEqual([
        { path: "body.resource", message: "Required" },
      ]);
    });

    it("should reject nested objects in the context", async () => {
      const response = await request(app)
        .post("/api/v1/authorize")
        .send({
          principalId: "u1",
          resource: "documents",
          action: "edit",
          context: { owner: { id: "u2" } },
        });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe(ErrorCode.VALIDATION_ERROR);
    });
  });

  describe("permission queries", () => {
    it("should list a principal's permissions", async () => {
      const response = await request(app).get("/api/v1/principals/u1/permissions");
      expect(response.status).toBe(200);
      expect(response.body).toEqual({ permissions: ["documents:edit"] });
    });

    it("should check a single permission", async () => {
      const granted = await request(app).get(
        "/api/v1/principals/u1/permissions/documents/edit",
      );
      const missing = await request(app).get(
        "/api/v1/principals/u2/permissions/documents/edit",
      );

      expect(granted.body).toEqual({ allowed: true });
      expect(missing.body).toEqual({ allowed: false });
    });

    it("should check a relationship", async () => {
      const response = await request(app).get(
        "/api/v1/principals/u1/relationships/manager/u2",
      );

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        isAllowed: true,
        reason: "Relationship manager to u2",
        decisionSource: DecisionSource.RELATIONSHIP,
      });
    });
  });

  it("should report health", async () => {
    const response = await request(app).get("/health");
    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      status: "OK",
      timestamp: "2024-06-03T10:00:00.000Z",
    });
  });
});
