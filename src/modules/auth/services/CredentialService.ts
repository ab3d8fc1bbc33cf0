/**
 * CredentialService - authentication and session lifecycle
 *
 * Verifies passwords, drives the account lockout state machine and issues,
 * rotates and revokes sessions. Each state change is a single atomic call
 * on the persistence gateway, so cancellation between calls never leaves a
 * half-applied login or rotation behind.
 *
 * Expected failures come back as `Result` values; only infrastructure
 * faults throw.
 */

import { LoginHistoryEntry } from "../../../domain/entities/LoginHistoryEntry";
import { Principal } from "../../../domain/entities/Principal";
import { RefreshToken } from "../../../domain/entities/RefreshToken";
import { AccountLockoutStateMachine } from "../../../domain/policies/AccountLockout";
import { IPrincipalRepository } from "../../../infrastructure/repositories/IPrincipalRepository";
import { IRefreshTokenRepository } from "../../../infrastructure/repositories/IRefreshTokenRepository";
import { ClockSource, systemClock } from "../../../shared/clock";
import { NotFoundError } from "../../../shared/errors";
import { logger } from "../../../shared/logger";
import { Result, fail, ok } from "../../../shared/result";
import { SecurityUtils } from "../../../shared/security";
import { RetryOptions, retryTransient } from "../../../shared/utils/retry";
import { PermissionCache } from "../../iam/cache/PermissionCache";
import { IPasswordHasher } from "./PasswordService";
import { ITokenSigner } from "./TokenService";

export type AuthFailure =
  | { kind: "InvalidCredentials" }
  | { kind: "AccountInactive" }
  | { kind: "AccountLocked"; lockedUntil: Date }
  | { kind: "InvalidToken" };

export interface LoginRequest {
  email: string;
  password: string;
  ipAddress: string;
  userAgent: string;
}

export interface SessionTokens {
  accessToken: string;
  /** Access token expiry */
  expiresAt: Date;
  refreshToken: string;
  refreshTokenId: string;
  refreshTokenExpiresAt: Date;
  tokenType: "Bearer";
}

export interface CredentialServiceDeps {
  principals: IPrincipalRepository;
  refreshTokens: IRefreshTokenRepository;
  permissionCache: PermissionCache;
  passwordHasher: IPasswordHasher;
  tokenSigner: ITokenSigner;
  lockout: AccountLockoutStateMachine;
  refreshTokenTtlSeconds: number;
  clock?: ClockSource;
  retry?: Omit<RetryOptions, "signal">;
}

/** Bytes of entropy in an opaque refresh token value */
const REFRESH_TOKEN_BYTES = 48;

interface IssuedRefreshToken {
  token: RefreshToken;
  value: string;
}

export class CredentialService {
  private readonly principals: IPrincipalRepository;
  private readonly refreshTokens: IRefreshTokenRepository;
  private readonly permissionCache: PermissionCache;
  private readonly passwordHasher: IPasswordHasher;
  private readonly tokenSigner: ITokenSigner;
  private readonly lockout: AccountLockoutStateMachine;
  private readonly refreshTokenTtlMs: number;
  private readonly clock: ClockSource;
  private readonly retry: Omit<RetryOptions, "signal">;
  private dummyHash: Promise<string> | null = null;

  constructor(deps: CredentialServiceDeps) {
    if (deps.refreshTokenTtlSeconds <= 0) {
      throw new Error("Refresh token TTL must be positive");
    }
    this.principals = deps.principals;
    this.refreshTokens = deps.refreshTokens;
    this.permissionCache = deps.permissionCache;
    this.passwordHasher = deps.passwordHasher;
    this.tokenSigner = deps.tokenSigner;
    this.lockout = deps.lockout;
    this.refreshTokenTtlMs = deps.refreshTokenTtlSeconds * 1000;
    this.clock = deps.clock ?? systemClock;
    this.retry = deps.retry ?? {};
  }

  async authenticate(
    request: LoginRequest,
    signal?: AbortSignal,
  ): Promise<Result<SessionTokens, AuthFailure>> {
    const now = this.clock.now();
    const principal = await retryTransient(
      () => this.principals.findByEmail(request.email, signal),
      "principals.findByEmail",
      { ...this.retry, signal },
    );

    if (!principal) {
      // Unknown email still costs one verify
      await this.passwordHasher.verify(
        request.password,
        await this.getDummyHash(),
      );
      logger.logAuth("LOGIN_FAILED", undefined, {
        reason: "unknown_email",
        ip: request.ipAddress,
      });
      return fail({ kind: "InvalidCredentials" });
    }

    if (!principal.isActive) {
      logger.logAuth("LOGIN_FAILED", principal.id, {
        reason: "inactive",
        ip: request.ipAddress,
      });
      return fail({ kind: "AccountInactive" });
    }

    const state = this.lockout.stateAt(principal.lockoutSnapshot, now);
    if (state.status === "Locked") {
      logger.logAuth("LOGIN_FAILED", principal.id, {
        reason: "locked",
        lockedUntil: state.until.toISOString(),
        ip: request.ipAddress,
      });
      return fail({ kind: "AccountLocked", lockedUntil: state.until });
    }

    const passwordMatches = await this.passwordHasher.verify(
      request.password,
      principal.passwordHash,
    );
    if (!passwordMatches) {
      return this.handleFailedPassword(principal, request, now, signal);
    }

    const permissions = await this.permissionCache.getPermissions(
      principal.id,
      signal,
    );
    const access = this.tokenSigner.issueAccessToken(
      {
        sub: principal.id,
        email: principal.email.value,
        roles: principal.roleIds,
        permissions: [...permissions].sort(),
      },
      now,
    );
    const refresh = this.buildRefreshToken(
      principal.id,
      SecurityUtils.generateId(),
      now,
    );

    signal?.throwIfAborted();
    await this.principals.recordSuccessfulLogin(
      principal.id,
      this.historyEntry(principal.id, request, now, true),
      () => this.lockout.onSuccess(),
      refresh.token,
      signal,
    );

    logger.logAuth("LOGIN_SUCCESS", principal.id, { ip: request.ipAddress });
    return ok({
      accessToken: access.token,
      expiresAt: access.expiresAt,
      refreshToken: refresh.value,
      refreshTokenId: refresh.token.id,
      refreshTokenExpiresAt: refresh.token.expiresAt,
      tokenType: "Bearer",
    });
  }

  /**
   * Rotate a refresh token. A token that was already rotated or revoked is
   * treated as replayed: its whole family is revoked.
   */
  async refreshSession(
    refreshToken: string,
    signal?: AbortSignal,
  ): Promise<Result<SessionTokens, AuthFailure>> {
    const now = this.clock.now();
    if (!refreshToken) {
      return fail({ kind: "InvalidToken" });
    }

    const stored = await retryTransient(
      () => this.refreshTokens.findByValue(refreshToken, signal),
      "refreshTokens.findByValue",
      { ...this.retry, signal },
    );
    if (!stored) {
      return fail({ kind: "InvalidToken" });
    }
    if (stored.isRevoked) {
      const revoked = await this.refreshTokens.revokeFamily(
        stored.familyId,
        now,
        signal,
      );
      logger.warn("Refresh token replay detected, family revoked", {
        principalId: stored.principalId,
        familyId: stored.familyId,
        revoked,
      });
      return fail({ kind: "InvalidToken" });
    }
    if (stored.isExpired(now)) {
      return fail({ kind: "InvalidToken" });
    }

    const principal = await retryTransient(
      () => this.principals.findById(stored.principalId, signal),
      "principals.findById",
      { ...this.retry, signal },
    );
    if (!principal) {
      return fail({ kind: "InvalidToken" });
    }
    if (!principal.isActive) {
      return fail({ kind: "AccountInactive" });
    }
    const state = this.lockout.stateAt(principal.lockoutSnapshot, now);
    if (state.status === "Locked") {
      return fail({ kind: "AccountLocked", lockedUntil: state.until });
    }

    const permissions = await this.permissionCache.getPermissions(
      principal.id,
      signal,
    );
    const next = this.buildRefreshToken(principal.id, stored.familyId, now);

    signal?.throwIfAborted();
    // Not retried: rotation is not idempotent
    const outcome = await this.refreshTokens.rotate(
      refreshToken,
      () => next.token,
      now,
      signal,
    );
    if (outcome.status !== "rotated") {
      // Lost a concurrent rotation of the same token
      logger.logAuth("REFRESH_FAILED", principal.id, {
        reason: outcome.status,
      });
      return fail({ kind: "InvalidToken" });
    }

    const access = this.tokenSigner.issueAccessToken(
      {
        sub: principal.id,
        email: principal.email.value,
        roles: principal.roleIds,
        permissions: [...permissions].sort(),
      },
      now,
    );

    logger.logAuth("TOKEN_REFRESHED", principal.id, {
      tokenId: outcome.replacement.id,
    });
    return ok({
      accessToken: access.token,
      expiresAt: access.expiresAt,
      refreshToken: next.value,
      refreshTokenId: outcome.replacement.id,
      refreshTokenExpiresAt: outcome.replacement.expiresAt,
      tokenType: "Bearer",
    });
  }

  /**
   * Revoke one refresh token. Returns false when it was already revoked.
   * Access tokens already issued stay valid until they expire.
   *
   * @param ownerId when given, the token must belong to this principal
   * @throws NotFoundError for an unknown token or a foreign one
   */
  async revokeSession(
    refreshTokenId: string,
    ownerId?: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const token = await retryTransient(
      () => this.refreshTokens.findTokenById(refreshTokenId, signal),
      "refreshTokens.findTokenById",
      { ...this.retry, signal },
    );
    if (!token || (ownerId !== undefined && token.principalId !== ownerId)) {
      throw new NotFoundError("RefreshToken", refreshTokenId);
    }
    if (token.isRevoked) {
      return false;
    }

    await this.refreshTokens.revoke(refreshTokenId, this.clock.now(), signal);
    logger.logAuth("LOGOUT", token.principalId, { tokenId: refreshTokenId });
    return true;
  }

  async revokeAllSessions(
    principalId: string,
    signal?: AbortSignal,
  ): Promise<number> {
    const revoked = await this.refreshTokens.revokeAllForPrincipal(
      principalId,
      this.clock.now(),
      signal,
    );
    logger.logAuth("LOGOUT_ALL", principalId, { revoked });
    return revoked;
  }

  private async handleFailedPassword(
    principal: Principal,
    request: LoginRequest,
    now: Date,
    signal?: AbortSignal,
  ): Promise<Result<SessionTokens, AuthFailure>> {
    signal?.throwIfAborted();
    const snapshot = await this.principals.recordFailedLogin(
      principal.id,
      this.historyEntry(principal.id, request, now, false, "invalid_password"),
      (current) => this.lockout.onFailure(current, now),
      signal,
    );

    const state = this.lockout.stateAt(snapshot, now);
    if (state.status === "Locked") {
      logger.logAuth("ACCOUNT_LOCKED", principal.id, {
        failedLoginCount: snapshot.failedLoginCount,
        lockedUntil: state.until.toISOString(),
        ip: request.ipAddress,
      });
      return fail({ kind: "AccountLocked", lockedUntil: state.until });
    }

    logger.logAuth("LOGIN_FAILED", principal.id, {
      reason: "invalid_password",
      failedLoginCount: snapshot.failedLoginCount,
      ip: request.ipAddress,
    });
    return fail({ kind: "InvalidCredentials" });
  }

  private buildRefreshToken(
    principalId: string,
    familyId: string,
    now: Date,
  ): IssuedRefreshToken {
    const value = SecurityUtils.generateSecureToken(REFRESH_TOKEN_BYTES);
    const token = new RefreshToken({
      id: SecurityUtils.generateId(),
      principalId,
      tokenHash: SecurityUtils.hashToken(value),
      familyId,
      createdAt: now,
      expiresAt: new Date(now.getTime() + this.refreshTokenTtlMs),
    });
    return { token, value };
  }

  private historyEntry(
    principalId: string,
    request: LoginRequest,
    now: Date,
    succeeded: boolean,
    failureReason?: string,
  ): LoginHistoryEntry {
    return {
      id: SecurityUtils.generateId(),
      principalId,
      succeeded,
      ipAddress: request.ipAddress,
      userAgent: request.userAgent,
      failureReason,
      occurredAt: now,
    };
  }

  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      // A rejected hash is not kept, so the next unknown email retries it
      this.dummyHash = this.passwordHasher
        .hash(SecurityUtils.generateSecureToken(16))
        .catch((error: unknown) => {
          this.dummyHash = null;
          throw error;
        });
    }
    return this.dummyHash;
  }
}
