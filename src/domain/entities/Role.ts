import { ValidationError } from "../../shared/errors";

class Role {
  private _id: string;
  private _name: string;
  private _description: string;
  private _isActive: boolean;
  private _permissionIds: string[];
  private _createdAt: Date;
  private _updatedAt: Date;

  constructor(
    id: string,
    name: string,
    permissionIds: string[] = [],
    isActive: boolean = true,
    description: string = "",
    createdAt: Date = new Date(),
    updatedAt: Date = new Date(),
  ) {
    // Invariants
    if (!id) throw new ValidationError("Role ID is required");
    Role.validateName(name);

    this._id = id;
    this._name = name.trim();
    this._description = description;
    this._isActive = isActive;
    this._permissionIds = [...new Set(permissionIds)];
    this._createdAt = createdAt;
    this._updatedAt = updatedAt;
  }

  private static validateName(name: string): void {
    const trimmed = name.trim();
    if (!trimmed) throw new ValidationError("Role name is required");
    if (trimmed.length > 100) {
      throw new ValidationError("Role name must be at most 100 characters");
    }
  }

  // Getters
  get id(): string {
    return this._id;
  }
  get name(): string {
    return this._name;
  }
  get description(): string {
    return this._description;
  }
  get isActive(): boolean {
    return this._isActive;
  }
  get permissionIds(): string[] {
    return [...this._permissionIds];
  }
  get createdAt(): Date {
    return this._createdAt;
  }
  get updatedAt(): Date {
    return this._updatedAt;
  }

  // Business logic methods
  addPermission(permissionId: string): void {
    if (!this._permissionIds.includes(permissionId)) {
      this._permissionIds.push(permissionId);
      this.touch();
    }
  }

  removePermission(permissionId: string): void {
    this._permissionIds = this._permissionIds.filter((p) => p !== permissionId);
    this.touch();
  }

  hasPermission(permissionId: string): boolean {
    return this._permissionIds.includes(permissionId);
  }

  rename(newName: string): void {
    Role.validateName(newName);
    this._name = newName.trim();
    this.touch();
  }

  activate(): void {
    this._isActive = true;
    this.touch();
  }

  deactivate(): void {
    this._isActive = false;
    this.touch();
  }

  clone(): Role {
    return new Role(
      this._id,
      this._name,
      this._permissionIds,
      this._isActive,
      this._description,
      this._createdAt,
      this._updatedAt,
    );
  }

  private touch(): void {
    this._updatedAt = new Date();
  }
}

export { Role };
