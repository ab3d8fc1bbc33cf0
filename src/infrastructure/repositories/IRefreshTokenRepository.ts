import { RefreshToken } from "../../domain/entities/RefreshToken";

export type RotationOutcome =
  | { status: "rotated"; previous: RefreshToken; replacement: RefreshToken }
  | { status: "not_found" }
  | { status: "expired"; token: RefreshToken }
  | { status: "revoked"; token: RefreshToken };

export interface IRefreshTokenRepository {
  findTokenById(id: string, signal?: AbortSignal): Promise<RefreshToken | null>;
  /** Looks the token up by the digest of its opaque value */
  findByValue(value: string, signal?: AbortSignal): Promise<RefreshToken | null>;
  /**
   * Single atomic "mark revoked and fetch": revokes the token holding
   * `oldValue` and inserts the replacement built from it. Of two concurrent
   * calls with the same value, at most one sees `rotated`.
   */
  rotate(
    oldValue: string,
    issueReplacement: (previous: RefreshToken) => RefreshToken,
    now: Date,
    signal?: AbortSignal,
  ): Promise<RotationOutcome>;
  /** Returns the stored token after revocation, or null when unknown */
  revoke(
    tokenId: string,
    now: Date,
    signal?: AbortSignal,
  ): Promise<RefreshToken | null>;
  /** Returns the number of tokens newly revoked */
  revokeFamily(familyId: string, now: Date, signal?: AbortSignal): Promise<number>;
  revokeAllForPrincipal(
    principalId: string,
    now: Date,
    signal?: AbortSignal,
  ): Promise<number>;
}
