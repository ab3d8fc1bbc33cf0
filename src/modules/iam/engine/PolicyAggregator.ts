/**
 * Policy Aggregator
 *
 * Resolves candidate policies into a single outcome. Policies are ordered
 * by priority (descending), then by id (ascending); the first policy whose
 * condition holds decides. Priority is authoritative over effect, so an
 * Allow at priority 100 wins over a Deny at priority 50.
 */

import { ConditionEvaluator } from "../conditions/ConditionEvaluator";
import { RequestContext } from "../conditions/types";
import { Policy, PolicyEffect } from "../policy/models/Policy";

export type AggregateOutcome =
  | { outcome: "Allowed"; policy: Policy }
  | { outcome: "Denied"; policy: Policy }
  | { outcome: "Indeterminate" };

export interface AggregationRequest {
  resource: string;
  action: string;
  context: RequestContext;
  evaluatedAt: Date;
}

export function comparePolicies(a: Policy, b: Policy): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

export class PolicyAggregator {
  constructor(
    private readonly evaluator: ConditionEvaluator = new ConditionEvaluator(),
  ) {}

  /**
   * Active policies applicable to (resource, action), in evaluation order.
   */
  order(
    policies: readonly Policy[],
    resource: string,
    action: string,
  ): Policy[] {
    return policies
      .filter((p) => p.isActive && p.appliesTo(resource, action))
      .sort(comparePolicies);
  }

  aggregate(
    policies: readonly Policy[],
    request: AggregationRequest,
  ): AggregateOutcome {
    const ordered = this.order(policies, request.resource, request.action);

    for (const policy of ordered) {
      if (
        this.evaluator.evaluate(
          policy.condition,
          request.context,
          request.evaluatedAt,
        )
      ) {
        return policy.effect === PolicyEffect.ALLOW
          ? { outcome: "Allowed", policy }
          : { outcome: "Denied", policy };
      }
    }

    return { outcome: "Indeterminate" };
  }
}
