import { ValidationError } from "../../shared/errors";

export interface RefreshTokenProps {
  id: string;
  principalId: string;
  tokenHash: string;
  familyId: string;
  expiresAt: Date;
  createdAt: Date;
  revokedAt?: Date | null;
  replacedByTokenId?: string | null;
}

/**
 * Persisted refresh token. Only the SHA-256 digest of the opaque value is
 * kept. Instances are immutable; revocation yields a new instance.
 */
class RefreshToken {
  readonly id: string;
  readonly principalId: string;
  readonly tokenHash: string;
  /** Tokens descending from the same login share a family */
  readonly familyId: string;
  readonly expiresAt: Date;
  readonly createdAt: Date;
  readonly revokedAt: Date | null;
  readonly replacedByTokenId: string | null;

  constructor(props: RefreshTokenProps) {
    if (!props.id) throw new ValidationError("Token ID is required");
    if (!props.principalId) {
      throw new ValidationError("Principal ID is required");
    }
    if (!props.tokenHash) throw new ValidationError("Token hash is required");
    if (props.expiresAt.getTime() <= props.createdAt.getTime()) {
      throw new ValidationError("Token must expire after it is created");
    }

    this.id = props.id;
    this.principalId = props.principalId;
    this.tokenHash = props.tokenHash;
    this.familyId = props.familyId;
    this.expiresAt = props.expiresAt;
    this.createdAt = props.createdAt;
    this.revokedAt = props.revokedAt ?? null;
    this.replacedByTokenId = props.replacedByTokenId ?? null;
  }

  get isRevoked(): boolean {
    return this.revokedAt !== null;
  }

  isExpired(now: Date): boolean {
    return this.expiresAt.getTime() <= now.getTime();
  }

  isActive(now: Date): boolean {
    return !this.isRevoked && !this.isExpired(now);
  }

  revoke(at: Date, replacedByTokenId?: string): RefreshToken {
    if (this.isRevoked) {
      return this;
    }
    return new RefreshToken({
      ...this.toProps(),
      revokedAt: at,
      replacedByTokenId: replacedByTokenId ?? null,
    });
  }

  toProps(): RefreshTokenProps {
    return {
      id: this.id,
      principalId: this.principalId,
      tokenHash: this.tokenHash,
      familyId: this.familyId,
      expiresAt: this.expiresAt,
      createdAt: this.createdAt,
      revokedAt: this.revokedAt,
      replacedByTokenId: this.replacedByTokenId,
    };
  }
}

export { RefreshToken };
