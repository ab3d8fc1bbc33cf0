import { Policy } from "../../modules/iam/policy/models/Policy";

export interface IPolicyRepository {
  /**
   * Active policies on `resource` whose action is `action` or the wildcard.
   */
  findActiveFor(
    resource: string,
    action: string,
    signal?: AbortSignal,
  ): Promise<Policy[]>;
}
