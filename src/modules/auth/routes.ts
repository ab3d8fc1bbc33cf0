import { Router } from "express";
import { AuthController } from "./controller";
import { loginSchema, logoutSchema, refreshTokenSchema } from "./schemas";
import { asyncHandler, validateRequest } from "../../shared/middleware/validation";
import { authenticateToken } from "../../shared/middleware/auth";
import { ITokenSigner } from "./services/TokenService";
import { ClockSource } from "../../shared/clock";

export function createAuthRouter(
  authController: AuthController,
  tokenSigner: ITokenSigner,
  clock: ClockSource,
): Router {
  const router = Router();

  router.post(
    "/login",
    validateRequest(loginSchema),
    asyncHandler((req, res) => authController.login(req, res)),
  );
  router.post(
    "/refresh",
    validateRequest(refreshTokenSchema),
    asyncHandler((req, res) => authController.refresh(req, res)),
  );
  router.post(
    "/logout",
    authenticateToken(tokenSigner, clock),
    validateRequest(logoutSchema),
    asyncHandler((req, res) => authController.logout(req, res)),
  );

  return router;
}
