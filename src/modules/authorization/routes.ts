import { Router } from "express";
import { AuthorizationController } from "./controller";
import {
  authorizeSchema,
  permissionCheckSchema,
  principalPermissionsSchema,
  relationshipCheckSchema,
} from "./schemas";
import { asyncHandler, validateRequest } from "../../shared/middleware/validation";

export function createAuthorizationRouter(
  controller: AuthorizationController,
): Router {
  const router = Router();

  router.post(
    "/authorize",
    validateRequest(authorizeSchema),
    asyncHandler((req, res) => controller.authorize(req, res)),
  );
  router.get(
    "/principals/:id/permissions",
    validateRequest(principalPermissionsSchema),
    asyncHandler((req, res) => controller.listPermissions(req, res)),
  );
  router.get(
    "/principals/:id/permissions/:resource/:action",
    validateRequest(permissionCheckSchema),
    asyncHandler((req, res) => controller.checkPermission(req, res)),
  );
  router.get(
    "/principals/:id/relationships/:type/:targetId",
    validateRequest(relationshipCheckSchema),
    asyncHandler((req, res) => controller.checkRelationship(req, res)),
  );

  return router;
}
