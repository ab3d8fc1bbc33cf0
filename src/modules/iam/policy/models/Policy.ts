import { ValidationError } from "../../../../shared/errors";
import { ConditionParser } from "../../conditions/ConditionParser";
import { ConditionNode } from "../../conditions/types";

/**
 * Effect constants for policies
 */
export enum PolicyEffect {
  ALLOW = "Allow",
  DENY = "Deny",
}

/** Action value that scopes a policy to every action on its resource */
export const WILDCARD_ACTION = "*";

export interface PolicyProps {
  id: string;
  name: string;
  resource: string;
  action: string;
  effect: PolicyEffect | string;
  /** Raw condition map; parsed once at construction */
  conditions?: unknown;
  priority?: number;
  isActive?: boolean;
  description?: string;
}

const parser = new ConditionParser();

export function parseEffect(value: string): PolicyEffect {
  switch (value.trim().toLowerCase()) {
    case "allow":
      return PolicyEffect.ALLOW;
    case "deny":
      return PolicyEffect.DENY;
    default:
      throw new ValidationError(`Invalid policy effect "${value}"`);
  }
}

class Policy {
  private _id: string;
  private _name: string;
  private _resource: string;
  private _action: string;
  private _effect: PolicyEffect;
  private _rawConditions: unknown;
  private _condition: ConditionNode;
  private _priority: number;
  private _isActive: boolean;
  private _description: string;

  constructor(props: PolicyProps) {
    // Invariants
    if (!props.id) throw new ValidationError("Policy ID is required");
    if (!props.name.trim()) throw new ValidationError("Policy name is required");
    if (!props.resource.trim()) {
      throw new ValidationError("Policy resource is required");
    }
    if (!props.action.trim()) {
      throw new ValidationError("Policy action is required");
    }
    const priority = props.priority ?? 0;
    if (!Number.isInteger(priority)) {
      throw new ValidationError("Policy priority must be an integer");
    }

    this._id = props.id;
    this._name = props.name.trim();
    this._resource = props.resource.trim();
    this._action = props.action.trim();
    this._effect = parseEffect(props.effect);
    this._rawConditions = structuredClone(props.conditions ?? {});
    this._condition = parser.parse(props.conditions);
    this._priority = priority;
    this._isActive = props.isActive ?? true;
    this._description = props.description ?? "";
  }

  // Getters
  get id(): string {
    return this._id;
  }
  get name(): string {
    return this._name;
  }
  get resource(): string {
    return this._resource;
  }
  get action(): string {
    return this._action;
  }
  get effect(): PolicyEffect {
    return this._effect;
  }
  get rawConditions(): unknown {
    return this._rawConditions;
  }
  get condition(): ConditionNode {
    return this._condition;
  }
  get priority(): number {
    return this._priority;
  }
  get isActive(): boolean {
    return this._isActive;
  }
  get description(): string {
    return this._description;
  }

  /**
   * True for an exact (resource, action) match or a wildcard-action policy
   * on the same resource.
   */
  appliesTo(resource: string, action: string): boolean {
    return (
      this._resource === resource &&
      (this._action === action || this._action === WILDCARD_ACTION)
    );
  }

  activate(): void {
    this._isActive = true;
  }

  deactivate(): void {
    this._isActive = false;
  }

  toProps(): PolicyProps {
    return {
      id: this._id,
      name: this._name,
      resource: this._resource,
      action: this._action,
      effect: this._effect,
      conditions: this._rawConditions,
      priority: this._priority,
      isActive: this._isActive,
      description: this._description,
    };
  }

  clone(): Policy {
    return new Policy(this.toProps());
  }
}

export { Policy };
