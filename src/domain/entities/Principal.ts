import { Email } from "../value-objects/Email";
import { LockoutSnapshot } from "../policies/AccountLockout";
import { ValidationError } from "../../shared/errors";

export interface RelationshipEdge {
  targetPrincipalId: string;
  relationshipType: string;
}

export interface PrincipalProps {
  id: string;
  email: Email;
  passwordHash: string;
  isActive?: boolean;
  isEmailVerified?: boolean;
  failedLoginCount?: number;
  lockedUntil?: Date | null;
  lastLoginAt?: Date | null;
  roleIds?: string[];
  attributes?: Record<string, string>;
  relationships?: RelationshipEdge[];
  createdAt?: Date;
  updatedAt?: Date;
}

/**
 * An authenticating subject. Roles, tokens and login history are referenced
 * by id only; the store owns those records.
 */
class Principal {
  private _id: string;
  private _email: Email;
  private _passwordHash: string;
  private _isActive: boolean;
  private _isEmailVerified: boolean;
  private _failedLoginCount: number;
  private _lockedUntil: Date | null;
  private _lastLoginAt: Date | null;
  private _roleIds: string[];
  private _attributes: Map<string, string>;
  private _relationships: RelationshipEdge[];
  private _createdAt: Date;
  private _updatedAt: Date;

  constructor(props: PrincipalProps) {
    // Invariants
    if (!props.id) throw new ValidationError("Principal ID is required");
    if (!props.passwordHash) {
      throw new ValidationError("Password hash is required");
    }
    const failedLoginCount = props.failedLoginCount ?? 0;
    if (!Number.isInteger(failedLoginCount) || failedLoginCount < 0) {
      throw new ValidationError("Failed login count must be >= 0");
    }

    this._id = props.id;
    this._email = props.email;
    this._passwordHash = props.passwordHash;
    this._isActive = props.isActive ?? true;
    this._isEmailVerified = props.isEmailVerified ?? false;
    this._failedLoginCount = failedLoginCount;
    this._lockedUntil = props.lockedUntil ?? null;
    this._lastLoginAt = props.lastLoginAt ?? null;
    this._roleIds = [...new Set(props.roleIds ?? [])];
    this._attributes = new Map(Object.entries(props.attributes ?? {}));
    this._relationships = (props.relationships ?? []).map((r) => ({ ...r }));
    this._createdAt = props.createdAt ?? new Date();
    this._updatedAt = props.updatedAt ?? this._createdAt;
  }

  // Getters
  get id(): string {
    return this._id;
  }
  get email(): Email {
    return this._email;
  }
  get passwordHash(): string {
    return this._passwordHash;
  }
  get isActive(): boolean {
    return this._isActive;
  }
  get isEmailVerified(): boolean {
    return this._isEmailVerified;
  }
  get failedLoginCount(): number {
    return this._failedLoginCount;
  }
  get lockedUntil(): Date | null {
    return this._lockedUntil;
  }
  get lastLoginAt(): Date | null {
    return this._lastLoginAt;
  }
  get roleIds(): string[] {
    return [...this._roleIds];
  }
  get attributes(): Record<string, string> {
    return Object.fromEntries(this._attributes);
  }
  get relationships(): RelationshipEdge[] {
    return this._relationships.map((r) => ({ ...r }));
  }
  get createdAt(): Date {
    return this._createdAt;
  }
  get updatedAt(): Date {
    return this._updatedAt;
  }
  get lockoutSnapshot(): LockoutSnapshot {
    return {
      failedLoginCount: this._failedLoginCount,
      lockedUntil: this._lockedUntil,
    };
  }

  isLockedAt(now: Date): boolean {
    return (
      this._lockedUntil !== null && this._lockedUntil.getTime() > now.getTime()
    );
  }

  // Business logic methods
  applyLockout(snapshot: LockoutSnapshot, at: Date): void {
    this._failedLoginCount = snapshot.failedLoginCount;
    this._lockedUntil = snapshot.lockedUntil;
    this._updatedAt = at;
  }

  recordLogin(at: Date): void {
    this._lastLoginAt = at;
    this._updatedAt = at;
  }

  assignRole(roleId: string): void {
    if (!this._roleIds.includes(roleId)) {
      this._roleIds.push(roleId);
    }
  }

  removeRole(roleId: string): void {
    this._roleIds = this._roleIds.filter((r) => r !== roleId);
  }

  hasRole(roleId: string): boolean {
    return this._roleIds.includes(roleId);
  }

  setAttribute(key: string, value: string): void {
    if (!key.trim()) throw new ValidationError("Attribute key is required");
    this._attributes.set(key, value);
  }

  addRelationship(targetPrincipalId: string, relationshipType: string): void {
    if (!targetPrincipalId || !relationshipType.trim()) {
      throw new ValidationError("Relationship target and type are required");
    }
    if (!this.hasRelationship(targetPrincipalId, relationshipType)) {
      this._relationships.push({ targetPrincipalId, relationshipType });
    }
  }

  hasRelationship(targetPrincipalId: string, relationshipType: string): boolean {
    return this._relationships.some(
      (r) =>
        r.targetPrincipalId === targetPrincipalId &&
        r.relationshipType === relationshipType,
    );
  }

  activate(): void {
    this._isActive = true;
  }

  deactivate(): void {
    this._isActive = false;
  }

  clone(): Principal {
    return new Principal({
      id: this._id,
      email: this._email,
      passwordHash: this._passwordHash,
      isActive: this._isActive,
      isEmailVerified: this._isEmailVerified,
      failedLoginCount: this._failedLoginCount,
      lockedUntil: this._lockedUntil,
      lastLoginAt: this._lastLoginAt,
      roleIds: this._roleIds,
      attributes: this.attributes,
      relationships: this._relationships,
      createdAt: this._createdAt,
      updatedAt: this._updatedAt,
    });
  }
}

export { Principal };
