/**
 * TokenService - signed access tokens
 *
 * Access tokens are HS256 JWTs carrying the principal id, email, role ids
 * and permission closure. They are never persisted; revoking a session
 * does not recall an access token that was already issued, it simply
 * expires. All timestamps come from the caller so a ClockSource drives
 * both issuance and verification.
 */

import * as jwt from "jsonwebtoken";
import { z } from "zod";
import { AuthenticationError, ErrorCode } from "../../../shared/errors";
import { logger } from "../../../shared/logger";
import { SecurityUtils } from "../../../shared/security";
import { parseDuration } from "../../../shared/utils/duration";

export interface AccessTokenClaims {
  sub: string;
  email: string;
  roles: string[];
  permissions: string[];
}

export interface IssuedAccessToken {
  token: string;
  jti: string;
  expiresAt: Date;
  /** Seconds until expiration */
  expiresIn: number;
}

export interface VerifiedAccessToken extends AccessTokenClaims {
  jti: string;
  issuedAt: Date;
  expiresAt: Date;
}

export interface ITokenSigner {
  issueAccessToken(claims: AccessTokenClaims, now: Date): IssuedAccessToken;
  /** @throws AuthenticationError (TOKEN_EXPIRED or TOKEN_INVALID) */
  verifyAccessToken(token: string, now: Date): VerifiedAccessToken;
}

export interface TokenServiceConfig {
  secret: string;
  issuer: string;
  audience: string;
  /** Duration string such as "15m" */
  accessTokenTtl: string;
}

const accessTokenPayloadSchema = z.object({
  sub: z.string().min(1),
  email: z.string(),
  roles: z.array(z.string()),
  permissions: z.array(z.string()),
  jti: z.string().min(1),
  iat: z.number(),
  exp: z.number(),
});

const ALGORITHM = "HS256";

export class TokenService implements ITokenSigner {
  private readonly accessTokenTtlSeconds: number;

  constructor(private readonly config: TokenServiceConfig) {
    if (!config.secret) {
      throw new Error("Token signing secret is required");
    }
    this.accessTokenTtlSeconds = parseDuration(config.accessTokenTtl);
  }

  issueAccessToken(claims: AccessTokenClaims, now: Date): IssuedAccessToken {
    const jti = SecurityUtils.generateId();
    const issuedAt = Math.floor(now.getTime() / 1000);
    const expiresAt = issuedAt + this.accessTokenTtlSeconds;

    const token = jwt.sign(
      {
        sub: claims.sub,
        email: claims.email,
        roles: claims.roles,
        permissions: claims.permissions,
        iat: issuedAt,
        exp: expiresAt,
      },
      this.config.secret,
      {
        algorithm: ALGORITHM,
        issuer: this.config.issuer,
        audience: this.config.audience,
        jwtid: jti,
      },
    );

    logger.debug("Issued access token", {
      principalId: claims.sub,
      jti,
      expiresIn: this.accessTokenTtlSeconds,
    });

    return {
      token,
      jti,
      expiresAt: new Date(expiresAt * 1000),
      expiresIn: this.accessTokenTtlSeconds,
    };
  }

  verifyAccessToken(token: string, now: Date): VerifiedAccessToken {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.config.secret, {
        algorithms: [ALGORITHM],
        issuer: this.config.issuer,
        audience: this.config.audience,
        clockTimestamp: Math.floor(now.getTime() / 1000),
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new AuthenticationError(
          ErrorCode.TOKEN_EXPIRED,
          "Access token has expired",
        );
      }
      if (error instanceof jwt.JsonWebTokenError) {
        logger.debug("Invalid access token", { error: error.message });
        throw new AuthenticationError(
          ErrorCode.TOKEN_INVALID,
          "Invalid access token",
        );
      }
      throw error;
    }

    const payload = accessTokenPayloadSchema.safeParse(decoded);
    if (!payload.success) {
      throw new AuthenticationError(
        ErrorCode.TOKEN_INVALID,
        "Access token is missing required claims",
      );
    }

    return {
      sub: payload.data.sub,
      email: payload.data.email,
      roles: payload.data.roles,
      permissions: payload.data.permissions,
      jti: payload.data.jti,
      issuedAt: new Date(payload.data.iat * 1000),
      expiresAt: new Date(payload.data.exp * 1000),
    };
  }
}
