import { Request, Response } from "express";
import { AuthorizationCoordinator } from "../iam/services/AuthorizationCoordinator";
import {
  authorizeSchema,
  permissionCheckSchema,
  principalPermissionsSchema,
  relationshipCheckSchema,
} from "./schemas";

export class AuthorizationController {
  constructor(private coordinator: AuthorizationCoordinator) {}

  async authorize(req: Request, res: Response) {
    const { principalId, resource, action, context } =
      authorizeSchema.shape.body.parse(req.body);
    const decision = await this.coordinator.authorize(
      principalId,
      resource,
      action,
      context,
    );
    res.status(200).json(decision);
  }

  async checkPermission(req: Request, res: Response) {
    const { id, resource, action } = permissionCheckSchema.shape.params.parse(
      req.params,
    );
    const allowed = await this.coordinator.hasPermission(id, resource, action);
    res.status(200).json({ allowed });
  }

  async listPermissions(req: Request, res: Response) {
    const { id } = principalPermissionsSchema.shape.params.parse(req.params);
    const permissions = await this.coordinator.getPermissions(id);
    res.status(200).json({ permissions });
  }

  async checkRelationship(req: Request, res: Response) {
    const { id, targetId, type } = relationshipCheckSchema.shape.params.parse(
      req.params,
    );
    const decision = await this.coordinator.authorizeRelationship(
      id,
      targetId,
      type,
    );
    res.status(200).json(decision);
  }
}
