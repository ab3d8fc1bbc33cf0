import { z } from "zod";
import { Permission } from "../../../domain/entities/Permission";
import { Principal } from "../../../domain/entities/Principal";
import { Role } from "../../../domain/entities/Role";
import { Email } from "../../../domain/value-objects/Email";
import { IPasswordHasher } from "../../../modules/auth/services/PasswordService";
import { Policy } from "../../../modules/iam/policy/models/Policy";
import { ValidationError } from "../../../shared/errors";
import { InMemoryStore } from "./InMemoryStore";

const permissionSeed = z.object({
  id: z.string().min(1),
  resource: z.string().min(1),
  action: z.string().min(1),
  description: z.string().optional(),
});

const roleSeed = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  permissionIds: z.array(z.string()).default([]),
  description: z.string().optional(),
});

const principalSeed = z.object({
  id: z.string().min(1),
  email: z.string().min(1),
  password: z.string().min(1),
  isActive: z.boolean().optional(),
  roleIds: z.array(z.string()).default([]),
  attributes: z.record(z.string()).default({}),
  relationships: z
    .array(
      z.object({
        targetPrincipalId: z.string().min(1),
        relationshipType: z.string().min(1),
      }),
    )
    .default([]),
});

const policySeed = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  resource: z.string().min(1),
  action: z.string().min(1),
  effect: z.string().min(1),
  priority: z.number().int().optional(),
  conditions: z.unknown().optional(),
  description: z.string().optional(),
});

export const seedDataSchema = z.object({
  permissions: z.array(permissionSeed).default([]),
  roles: z.array(roleSeed).default([]),
  principals: z.array(principalSeed).default([]),
  policies: z.array(policySeed).default([]),
});

export interface SeedSummary {
  permissions: number;
  roles: number;
  principals: number;
  policies: number;
}

/**
 * Load development data into the store. Passwords are hashed on the way
 * in; the seed file holds them in plain text.
 *
 * @throws ValidationError when the data does not match `seedDataSchema`
 */
export async function seedStore(
  store: InMemoryStore,
  data: unknown,
  passwordHasher: IPasswordHasher,
  now: Date,
): Promise<SeedSummary> {
  const parsed = seedDataSchema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError("Invalid seed data", {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  const seed = parsed.data;

  for (const p of seed.permissions) {
    await store.savePermission(
      new Permission(p.id, p.resource, p.action, p.description),
    );
  }
  for (const r of seed.roles) {
    await store.saveRole(
      new Role(r.id, r.name, r.permissionIds, true, r.description, now, now),
    );
  }
  for (const p of seed.principals) {
    await store.save(
      new Principal({
        id: p.id,
        email: new Email(p.email),
        passwordHash: await passwordHasher.hash(p.password),
        isActive: p.isActive,
        roleIds: p.roleIds,
        attributes: p.attributes,
        relationships: p.relationships,
        createdAt: now,
      }),
    );
  }
  for (const p of seed.policies) {
    await store.savePolicy(new Policy(p));
  }

  return {
    permissions: seed.permissions.length,
    roles: seed.roles.length,
    principals: seed.principals.length,
    policies: seed.policies.length,
  };
}
