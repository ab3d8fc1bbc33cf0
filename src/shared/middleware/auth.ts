import { Request, Response, NextFunction, RequestHandler } from "express";
import { SecurityUtils } from "../security";
import { AuthenticationError } from "../errors/DomainErrors";
import { ErrorCode } from "../errors/AppError";
import { ClockSource, systemClock } from "../clock";
import { logger } from "../logger";
import { ITokenSigner } from "../../modules/auth/services/TokenService";

export interface AuthenticatedPrincipal {
  id: string;
  email: string;
  roles: string[];
  permissions: string[];
  tokenId: string;
}

export interface AuthenticatedRequest extends Request {
  principal?: AuthenticatedPrincipal;
}

/**
 * Bearer-token guard. Verifies the access token and attaches the
 * principal to the request.
 */
export const authenticateToken = (
  tokenSigner: ITokenSigner,
  clock: ClockSource = systemClock,
): RequestHandler => {
  return (req: AuthenticatedRequest, _res: Response, next: NextFunction) => {
    const token = SecurityUtils.extractTokenFromHeader(req.headers.authorization);
    if (!token) {
      next(new AuthenticationError(ErrorCode.TOKEN_MISSING));
      return;
    }

    try {
      const verified = tokenSigner.verifyAccessToken(token, clock.now());
      req.principal = {
        id: verified.sub,
        email: verified.email,
        roles: verified.roles,
        permissions: verified.permissions,
        tokenId: verified.jti,
      };
      next();
    } catch (error) {
      logger.logAuth("TOKEN_REJECTED", undefined, {
        ip: req.ip,
        error: error instanceof Error ? error.message : String(error),
      });
      next(error);
    }
  };
};
