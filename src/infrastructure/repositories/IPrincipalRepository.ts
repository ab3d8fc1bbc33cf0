import { Principal } from "../../domain/entities/Principal";
import { LoginHistoryEntry } from "../../domain/entities/LoginHistoryEntry";
import { RefreshToken } from "../../domain/entities/RefreshToken";
import { LockoutSnapshot } from "../../domain/policies/AccountLockout";

/**
 * Computes the next lockout fields from the current ones. The repository
 * applies it against the stored row inside one atomic unit.
 */
export type LockoutTransition = (current: LockoutSnapshot) => LockoutSnapshot;

export interface IPrincipalRepository {
  findById(id: string, signal?: AbortSignal): Promise<Principal | null>;
  /** Case-insensitive, surrounding whitespace ignored */
  findByEmail(email: string, signal?: AbortSignal): Promise<Principal | null>;
  save(principal: Principal, signal?: AbortSignal): Promise<void>;
  /**
   * Atomically apply the failure transition and append the history entry.
   * Returns the lockout fields as stored afterwards.
   */
  recordFailedLogin(
    principalId: string,
    entry: LoginHistoryEntry,
    transition: LockoutTransition,
    signal?: AbortSignal,
  ): Promise<LockoutSnapshot>;
  /**
   * Atomically apply the success transition, set lastLoginAt, append the
   * history entry and insert the new refresh token.
   */
  recordSuccessfulLogin(
    principalId: string,
    entry: LoginHistoryEntry,
    transition: LockoutTransition,
    refreshToken: RefreshToken,
    signal?: AbortSignal,
  ): Promise<void>;
  hasRelationship(
    principalId: string,
    targetPrincipalId: string,
    relationshipType: string,
    signal?: AbortSignal,
  ): Promise<boolean>;
}
