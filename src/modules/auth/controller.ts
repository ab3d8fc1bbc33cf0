import { Request, Response } from "express";
import {
  AuthFailure,
  CredentialService,
  SessionTokens,
} from "./services/CredentialService";
import { LoginInput, LogoutInput, RefreshTokenInput } from "./schemas";
import { AuthenticationError, ErrorCode } from "../../shared/errors";
import { AuthenticatedRequest } from "../../shared/middleware/auth";

export function toAuthenticationError(failure: AuthFailure): AuthenticationError {
  switch (failure.kind) {
    case "InvalidCredentials":
      return new AuthenticationError(ErrorCode.INVALID_CREDENTIALS);
    case "AccountInactive":
      return new AuthenticationError(ErrorCode.ACCOUNT_INACTIVE);
    case "AccountLocked":
      return AuthenticationError.accountLocked(failure.lockedUntil);
    case "InvalidToken":
      return new AuthenticationError(
        ErrorCode.TOKEN_INVALID,
        "Invalid refresh token",
      );
  }
}

function toResponse(tokens: SessionTokens) {
  return {
    accessToken: tokens.accessToken,
    expiresAt: tokens.expiresAt.toISOString(),
    refreshToken: tokens.refreshToken,
    refreshTokenId: tokens.refreshTokenId,
    refreshTokenExpiresAt: tokens.refreshTokenExpiresAt.toISOString(),
    tokenType: tokens.tokenType,
  };
}

export class AuthController {
  constructor(private credentialService: CredentialService) {}

  async login(req: Request<{}, unknown, LoginInput>, res: Response) {
    const { email, password } = req.body;
    const result = await this.credentialService.authenticate({
      email,
      password,
      ipAddress: req.ip ?? "unknown",
      userAgent: req.get("User-Agent") ?? "unknown",
    });

    if (!result.ok) {
      throw toAuthenticationError(result.error);
    }
    res.status(200).json(toResponse(result.value));
  }

  async refresh(req: Request<{}, unknown, RefreshTokenInput>, res: Response) {
    const result = await this.credentialService.refreshSession(
      req.body.refreshToken,
    );

    if (!result.ok) {
      throw toAuthenticationError(result.error);
    }
    res.status(200).json(toResponse(result.value));
  }

  async logout(req: AuthenticatedRequest, res: Response) {
    const principal = req.principal;
    if (!principal) {
      throw new AuthenticationError(ErrorCode.TOKEN_MISSING);
    }
    const body: LogoutInput = req.body;
    await this.credentialService.revokeSession(body.tokenId, principal.id);
    res.status(204).send();
  }
}
