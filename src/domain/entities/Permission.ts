import { ValidationError } from "../../shared/errors";

/**
 * A grantable (resource, action) pair. Its canonical string form is
 * `resource:action`.
 */
class Permission {
  private _id: string;
  private _resource: string;
  private _action: string;
  private _description: string;

  constructor(
    id: string,
    resource: string,
    action: string,
    description: string = "",
  ) {
    // Invariants
    if (!id) throw new ValidationError("Permission ID is required");
    if (!resource.trim()) throw new ValidationError("Resource is required");
    if (!action.trim()) throw new ValidationError("Action is required");
    if (resource.includes(":") || action.includes(":")) {
      throw new ValidationError("Resource and action must not contain ':'");
    }

    this._id = id;
    this._resource = resource.trim();
    this._action = action.trim();
    this._description = description;
  }

  static key(resource: string, action: string): string {
    return `${resource}:${action}`;
  }

  // Getters
  get id(): string {
    return this._id;
  }
  get resource(): string {
    return this._resource;
  }
  get action(): string {
    return this._action;
  }
  get description(): string {
    return this._description;
  }
  get key(): string {
    return Permission.key(this._resource, this._action);
  }

  matches(resource: string, action: string): boolean {
    return this._resource === resource && this._action === action;
  }

  toString(): string {
    return this.key;
  }
}

export { Permission };
