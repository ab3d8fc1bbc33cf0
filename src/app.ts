import express from "express";
import { AuthController } from "./modules/auth/controller";
import { createAuthRouter } from "./modules/auth/routes";
import { CredentialService } from "./modules/auth/services/CredentialService";
import { ITokenSigner } from "./modules/auth/services/TokenService";
import { AuthorizationController } from "./modules/authorization/controller";
import { createAuthorizationRouter } from "./modules/authorization/routes";
import { AuthorizationCoordinator } from "./modules/iam/services/AuthorizationCoordinator";
import { ClockSource, systemClock } from "./shared/clock";
import { logger } from "./shared/logger";
import { errorHandler, notFoundHandler } from "./shared/middleware/errorHandler";

export interface AppDependencies {
  credentialService: CredentialService;
  coordinator: AuthorizationCoordinator;
  tokenSigner: ITokenSigner;
  clock?: ClockSource;
  /** Express `trust proxy` setting; enables X-Forwarded-For for req.ip */
  trustProxy?: boolean | number | string;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const clock = deps.clock ?? systemClock;

  if (deps.trustProxy !== undefined) {
    app.set("trust proxy", deps.trustProxy);
  }

  app.use(express.json());

  // Request logging
  app.use((req, res, next) => {
    const startTime = Date.now();
    res.on("finish", () => {
      logger.debug("Request completed", {
        method: req.method,
        url: req.originalUrl,
        statusCode: res.statusCode,
        ip: req.ip,
        responseTimeMs: Date.now() - startTime,
      });
    });
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "OK", timestamp: clock.now().toISOString() });
  });

  app.use(
    "/api/v1/auth",
    createAuthRouter(
      new AuthController(deps.credentialService),
      deps.tokenSigner,
      clock,
    ),
  );
  app.use(
    "/api/v1",
    createAuthorizationRouter(new AuthorizationController(deps.coordinator)),
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
