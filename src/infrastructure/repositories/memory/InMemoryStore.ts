import { Principal } from "../../../domain/entities/Principal";
import { Role } from "../../../domain/entities/Role";
import { Permission } from "../../../domain/entities/Permission";
import { RefreshToken } from "../../../domain/entities/RefreshToken";
import { LoginHistoryEntry } from "../../../domain/entities/LoginHistoryEntry";
import { LockoutSnapshot } from "../../../domain/policies/AccountLockout";
import { Email } from "../../../domain/value-objects/Email";
import { Policy } from "../../../modules/iam/policy/models/Policy";
import { ConflictError, NotFoundError } from "../../../shared/errors";
import { SecurityUtils } from "../../../shared/security";
import {
  IPrincipalRepository,
  LockoutTransition,
} from "../IPrincipalRepository";
import { IPermissionRepository } from "../IPermissionRepository";
import { IPolicyRepository } from "../IPolicyRepository";
import {
  IRefreshTokenRepository,
  RotationOutcome,
} from "../IRefreshTokenRepository";
import { ILoginHistoryRepository } from "../ILoginHistoryRepository";

/**
 * Called with the principals whose permission closure a management write
 * changed.
 */
export type PermissionsChangedHook = (principalIds: string[]) => Promise<void>;

export interface InMemoryStoreOptions {
  onPermissionsChanged?: PermissionsChangedHook;
}

/**
 * In-memory persistence gateway.
 *
 * Records are kept in id-keyed maps and cross-reference each other by id
 * only. Every method does its work synchronously after the optional abort
 * check, so each call is atomic within one Node.js process. Principals,
 * roles and policies are copied on the way in and out; tokens, permissions
 * and history entries are immutable or copied on read.
 */
export class InMemoryStore
  implements
    IPrincipalRepository,
    IPermissionRepository,
    IPolicyRepository,
    IRefreshTokenRepository,
    ILoginHistoryRepository
{
  private principals = new Map<string, Principal>();
  private emailIndex = new Map<string, string>(); // normalized email -> id
  private roles = new Map<string, Role>();
  private permissions = new Map<string, Permission>();
  private policies = new Map<string, Policy>();
  private tokens = new Map<string, RefreshToken>();
  private hashIndex = new Map<string, string>(); // token hash -> id
  private familyIndex = new Map<string, Set<string>>(); // family -> ids
  private principalTokenIndex = new Map<string, Set<string>>(); // principal -> ids
  private loginHistory = new Map<string, LoginHistoryEntry[]>();
  private onPermissionsChanged?: PermissionsChangedHook;

  constructor(options: InMemoryStoreOptions = {}) {
    this.onPermissionsChanged = options.onPermissionsChanged;
  }

  setPermissionsChangedHook(hook: PermissionsChangedHook): void {
    this.onPermissionsChanged = hook;
  }

  // ==========================================================================
  // Principals
  // ==========================================================================

  async findById(id: string, signal?: AbortSignal): Promise<Principal | null> {
    signal?.throwIfAborted();
    return this.principals.get(id)?.clone() ?? null;
  }

  async findByEmail(
    email: string,
    signal?: AbortSignal,
  ): Promise<Principal | null> {
    signal?.throwIfAborted();
    const id = this.emailIndex.get(Email.normalize(email));
    if (!id) return null;
    return this.principals.get(id)?.clone() ?? null;
  }

  async save(principal: Principal, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    const email = principal.email.value;
    const ownerId = this.emailIndex.get(email);
    if (ownerId && ownerId !== principal.id) {
      throw new ConflictError("Email is already registered", { email });
    }

    const previous = this.principals.get(principal.id);
    if (previous && previous.email.value !== email) {
      this.emailIndex.delete(previous.email.value);
    }
    this.principals.set(principal.id, principal.clone());
    this.emailIndex.set(email, principal.id);
  }

  async recordFailedLogin(
    principalId: string,
    entry: LoginHistoryEntry,
    transition: LockoutTransition,
    signal?: AbortSignal,
  ): Promise<LockoutSnapshot> {
    signal?.throwIfAborted();
    const principal = this.requirePrincipal(principalId);
    const next = transition(principal.lockoutSnapshot);
    principal.applyLockout(next, entry.occurredAt);
    this.appendHistory(entry);
    return principal.lockoutSnapshot;
  }

  async recordSuccessfulLogin(
    principalId: string,
    entry: LoginHistoryEntry,
    transition: LockoutTransition,
    refreshToken: RefreshToken,
    signal?: AbortSignal,
  ): Promise<void> {
    signal?.throwIfAborted();
    const principal = this.requirePrincipal(principalId);
    if (refreshToken.principalId !== principalId) {
      throw new ConflictError("Refresh token belongs to another principal");
    }
    this.assertTokenIsNew(refreshToken);

    principal.applyLockout(
      transition(principal.lockoutSnapshot),
      entry.occurredAt,
    );
    principal.recordLogin(entry.occurredAt);
    this.appendHistory(entry);
    this.insertToken(refreshToken);
  }

  async hasRelationship(
    principalId: string,
    targetPrincipalId: string,
    relationshipType: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    signal?.throwIfAborted();
    const principal = this.principals.get(principalId);
    return (
      principal?.hasRelationship(targetPrincipalId, relationshipType) ?? false
    );
  }

  // ==========================================================================
  // Permission closure and policies
  // ==========================================================================

  async findPermissionClosure(
    principalId: string,
    signal?: AbortSignal,
  ): Promise<string[]> {
    signal?.throwIfAborted();
    const principal = this.principals.get(principalId);
    if (!principal) return [];

    const keys = new Set<string>();
    for (const roleId of principal.roleIds) {
      const role = this.roles.get(roleId);
      if (!role?.isActive) continue;
      for (const permissionId of role.permissionIds) {
        const permission = this.permissions.get(permissionId);
        if (permission) keys.add(permission.key);
      }
    }
    return [...keys].sort();
  }

  async findActiveFor(
    resource: string,
    action: string,
    signal?: AbortSignal,
  ): Promise<Policy[]> {
    signal?.throwIfAborted();
    return [...this.policies.values()]
      .filter((policy) => policy.isActive && policy.appliesTo(resource, action))
      .map((policy) => policy.clone());
  }

  // ==========================================================================
  // Refresh tokens
  // ==========================================================================

  async findTokenById(
    id: string,
    signal?: AbortSignal,
  ): Promise<RefreshToken | null> {
    signal?.throwIfAborted();
    return this.tokens.get(id) ?? null;
  }

  async findByValue(
    value: string,
    signal?: AbortSignal,
  ): Promise<RefreshToken | null> {
    signal?.throwIfAborted();
    const id = this.hashIndex.get(SecurityUtils.hashToken(value));
    if (!id) return null;
    return this.tokens.get(id) ?? null;
  }

  async rotate(
    oldValue: string,
    issueReplacement: (previous: RefreshToken) => RefreshToken,
    now: Date,
    signal?: AbortSignal,
  ): Promise<RotationOutcome> {
    signal?.throwIfAborted();
    const id = this.hashIndex.get(SecurityUtils.hashToken(oldValue));
    const current = id ? this.tokens.get(id) : undefined;
    if (!current) {
      return { status: "not_found" };
    }
    if (current.isRevoked) {
      return { status: "revoked", token: current };
    }
    if (current.isExpired(now)) {
      return { status: "expired", token: current };
    }

    const replacement = issueReplacement(current);
    if (replacement.principalId !== current.principalId) {
      throw new ConflictError("Replacement token must keep the same principal");
    }
    this.assertTokenIsNew(replacement);

    const previous = current.revoke(now, replacement.id);
    this.tokens.set(previous.id, previous);
    this.insertToken(replacement);
    return { status: "rotated", previous, replacement };
  }

  async revoke(
    tokenId: string,
    now: Date,
    signal?: AbortSignal,
  ): Promise<RefreshToken | null> {
    signal?.throwIfAborted();
    const token = this.tokens.get(tokenId);
    if (!token) return null;
    const revoked = token.revoke(now);
    this.tokens.set(tokenId, revoked);
    return revoked;
  }

  async revokeFamily(
    familyId: string,
    now: Date,
    signal?: AbortSignal,
  ): Promise<number> {
    signal?.throwIfAborted();
    return this.revokeIds(this.familyIndex.get(familyId), now);
  }

  async revokeAllForPrincipal(
    principalId: string,
    now: Date,
    signal?: AbortSignal,
  ): Promise<number> {
    signal?.throwIfAborted();
    return this.revokeIds(this.principalTokenIndex.get(principalId), now);
  }

  // ==========================================================================
  // Login history
  // ==========================================================================

  async findByPrincipal(
    principalId: string,
    limit: number = 50,
    signal?: AbortSignal,
  ): Promise<LoginHistoryEntry[]> {
    signal?.throwIfAborted();
    const entries = this.loginHistory.get(principalId) ?? [];
    return entries
      .slice(-limit)
      .reverse()
      .map((entry) => ({ ...entry }));
  }

  // ==========================================================================
  // Management writes
  // ==========================================================================

  async saveRole(role: Role): Promise<void> {
    const name = role.name.toLowerCase();
    for (const existing of this.roles.values()) {
      if (existing.id !== role.id && existing.name.toLowerCase() === name) {
        throw new ConflictError(`Role "${role.name}" already exists`);
      }
    }
    const previous = this.roles.get(role.id);
    this.roles.set(role.id, role.clone());
    if (previous) {
      await this.notify(this.principalsWithRole(role.id));
    }
  }

  async savePermission(permission: Permission): Promise<void> {
    for (const existing of this.permissions.values()) {
      if (
        existing.id !== permission.id &&
        existing.matches(permission.resource, permission.action)
      ) {
        throw new ConflictError(
          `Permission "${permission.key}" already exists`,
        );
      }
    }
    this.permissions.set(permission.id, permission);
  }

  async savePolicy(policy: Policy): Promise<void> {
    const name = policy.name.toLowerCase();
    for (const existing of this.policies.values()) {
      if (existing.id !== policy.id && existing.name.toLowerCase() === name) {
        throw new ConflictError(`Policy "${policy.name}" already exists`);
      }
    }
    this.policies.set(policy.id, policy.clone());
  }

  async assignRole(principalId: string, roleId: string): Promise<void> {
    const principal = this.requirePrincipal(principalId);
    this.requireRole(roleId);
    principal.assignRole(roleId);
    await this.notify([principalId]);
  }

  async removeRole(principalId: string, roleId: string): Promise<void> {
    const principal = this.requirePrincipal(principalId);
    principal.removeRole(roleId);
    await this.notify([principalId]);
  }

  async grantPermission(roleId: string, permissionId: string): Promise<void> {
    const role = this.requireRole(roleId);
    if (!this.permissions.has(permissionId)) {
      throw new NotFoundError("Permission", permissionId);
    }
    role.addPermission(permissionId);
    await this.notify(this.principalsWithRole(roleId));
  }

  async revokePermission(roleId: string, permissionId: string): Promise<void> {
    const role = this.requireRole(roleId);
    role.removePermission(permissionId);
    await this.notify(this.principalsWithRole(roleId));
  }

  async setRoleActive(roleId: string, active: boolean): Promise<void> {
    const role = this.requireRole(roleId);
    if (active) {
      role.activate();
    } else {
      role.deactivate();
    }
    await this.notify(this.principalsWithRole(roleId));
  }

  principalsWithRole(roleId: string): string[] {
    return [...this.principals.values()]
      .filter((principal) => principal.hasRole(roleId))
      .map((principal) => principal.id);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private requirePrincipal(id: string): Principal {
    const principal = this.principals.get(id);
    if (!principal) throw new NotFoundError("Principal", id);
    return principal;
  }

  private requireRole(id: string): Role {
    const role = this.roles.get(id);
    if (!role) throw new NotFoundError("Role", id);
    return role;
  }

  private appendHistory(entry: LoginHistoryEntry): void {
    const entries = this.loginHistory.get(entry.principalId) ?? [];
    entries.push({ ...entry });
    this.loginHistory.set(entry.principalId, entries);
  }

  private assertTokenIsNew(token: RefreshToken): void {
    if (this.tokens.has(token.id) || this.hashIndex.has(token.tokenHash)) {
      throw new ConflictError("Refresh token already exists");
    }
  }

  private insertToken(token: RefreshToken): void {
    this.tokens.set(token.id, token);
    this.hashIndex.set(token.tokenHash, token.id);
    this.addToIndex(this.familyIndex, token.familyId, token.id);
    this.addToIndex(this.principalTokenIndex, token.principalId, token.id);
  }

  private addToIndex(
    index: Map<string, Set<string>>,
    key: string,
    id: string,
  ): void {
    const ids = index.get(key) ?? new Set<string>();
    ids.add(id);
    index.set(key, ids);
  }

  private revokeIds(ids: Set<string> | undefined, now: Date): number {
    let revoked = 0;
    for (const id of ids ?? []) {
      const token = this.tokens.get(id);
      if (token && !token.isRevoked) {
        this.tokens.set(id, token.revoke(now));
        revoked++;
      }
    }
    return revoked;
  }

  private async notify(principalIds: string[]): Promise<void> {
    if (this.onPermissionsChanged && principalIds.length > 0) {
      await this.onPermissionsChanged(principalIds);
    }
  }
}
