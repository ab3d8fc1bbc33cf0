/**
 * Authorization Coordinator
 *
 * Single decision entry point. With a non-empty context, active policies
 * for (resource, action) are evaluated first; an Indeterminate outcome, or
 * no context at all, falls back to the principal's RBAC permission closure.
 */

import { IPolicyRepository } from "../../../infrastructure/repositories/IPolicyRepository";
import { IPrincipalRepository } from "../../../infrastructure/repositories/IPrincipalRepository";
import { Permission } from "../../../domain/entities/Permission";
import { ClockSource, systemClock } from "../../../shared/clock";
import { ValidationError } from "../../../shared/errors";
import { logger } from "../../../shared/logger";
import { RetryOptions, retryTransient } from "../../../shared/utils/retry";
import { PermissionCache } from "../cache/PermissionCache";
import { RequestContext } from "../conditions/types";
import { PolicyAggregator } from "../engine/PolicyAggregator";
import { AuthorizationDecision, DecisionSource } from "../types/authorization";

export interface AuthorizationCoordinatorDeps {
  policies: IPolicyRepository;
  principals: IPrincipalRepository;
  permissionCache: PermissionCache;
  aggregator?: PolicyAggregator;
  clock?: ClockSource;
  retry?: Omit<RetryOptions, "signal">;
}

function requireValue(value: string, name: string): void {
  if (!value || !value.trim()) {
    throw new ValidationError(`${name} is required`);
  }
}

export class AuthorizationCoordinator {
  private readonly policies: IPolicyRepository;
  private readonly principals: IPrincipalRepository;
  private readonly permissionCache: PermissionCache;
  private readonly aggregator: PolicyAggregator;
  private readonly clock: ClockSource;
  private readonly retry: Omit<RetryOptions, "signal">;

  constructor(deps: AuthorizationCoordinatorDeps) {
    this.policies = deps.policies;
    this.principals = deps.principals;
    this.permissionCache = deps.permissionCache;
    this.aggregator = deps.aggregator ?? new PolicyAggregator();
    this.clock = deps.clock ?? systemClock;
    this.retry = deps.retry ?? {};
  }

  async authorize(
    principalId: string,
    resource: string,
    action: string,
    context?: RequestContext | null,
    signal?: AbortSignal,
  ): Promise<AuthorizationDecision> {
    requireValue(principalId, "principalId");
    requireValue(resource, "resource");
    requireValue(action, "action");

    if (context && Object.keys(context).length > 0) {
      const policyDecision = await this.evaluatePolicies(
        principalId,
        resource,
        action,
        context,
        signal,
      );
      if (policyDecision) {
        logger.logDecision(policyDecision, { principalId, resource, action });
        return policyDecision;
      }
    }

    const permission = Permission.key(resource, action);
    const allowed = await this.permissionCache.hasPermission(
      principalId,
      permission,
      signal,
    );
    const decision: AuthorizationDecision = allowed
      ? {
          isAllowed: true,
          reason: `Granted by permission ${permission}`,
          decisionSource: DecisionSource.PERMISSION,
        }
      : {
          isAllowed: false,
          reason: `No permission ${permission}`,
          decisionSource: DecisionSource.NONE,
        };

    logger.logDecision(decision, { principalId, resource, action });
    return decision;
  }

  async hasPermission(
    principalId: string,
    resource: string,
    action: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    requireValue(principalId, "principalId");
    return this.permissionCache.hasPermission(
      principalId,
      Permission.key(resource, action),
      signal,
    );
  }

  /**
   * The principal's permission closure, sorted.
   */
  async getPermissions(
    principalId: string,
    signal?: AbortSignal,
  ): Promise<string[]> {
    requireValue(principalId, "principalId");
    const permissions = await this.permissionCache.getPermissions(
      principalId,
      signal,
    );
    return [...permissions].sort();
  }

  async hasRelationship(
    principalId: string,
    targetPrincipalId: string,
    relationshipType: string,
    signal?: AbortSignal,
  ): Promise<boolean> {
    requireValue(principalId, "principalId");
    requireValue(targetPrincipalId, "targetPrincipalId");
    requireValue(relationshipType, "relationshipType");
    return retryTransient(
      () =>
        this.principals.hasRelationship(
          principalId,
          targetPrincipalId,
          relationshipType,
          signal,
        ),
      "principals.hasRelationship",
      { ...this.retry, signal },
    );
  }

  /**
   * Relationship check expressed as a decision. Not part of `authorize`.
   */
  async authorizeRelationship(
    principalId: string,
    targetPrincipalId: string,
    relationshipType: string,
    signal?: AbortSignal,
  ): Promise<AuthorizationDecision> {
    const related = await this.hasRelationship(
      principalId,
      targetPrincipalId,
      relationshipType,
      signal,
    );
    return related
      ? {
          isAllowed: true,
          reason: `Relationship ${relationshipType} to ${targetPrincipalId}`,
          decisionSource: DecisionSource.RELATIONSHIP,
        }
      : {
          isAllowed: false,
          reason: `No relationship ${relationshipType} to ${targetPrincipalId}`,
          decisionSource: DecisionSource.NONE,
        };
  }

  async invalidate(principalId: string): Promise<void> {
    await this.permissionCache.invalidate(principalId);
  }

  private async evaluatePolicies(
    principalId: string,
    resource: string,
    action: string,
    context: RequestContext,
    signal?: AbortSignal,
  ): Promise<AuthorizationDecision | null> {
    const candidates = await retryTransient(
      () => this.policies.findActiveFor(resource, action, signal),
      "policies.findActiveFor",
      { ...this.retry, signal },
    );
    if (candidates.length === 0) {
      return null;
    }

    const enriched = await this.enrichContext(principalId, context, signal);
    const result = this.aggregator.aggregate(candidates, {
      resource,
      action,
      context: enriched,
      evaluatedAt: this.clock.now(),
    });

    if (result.outcome === "Indeterminate") {
      return null;
    }
    return {
      isAllowed: result.outcome === "Allowed",
      reason: result.policy.name,
      decisionSource: DecisionSource.POLICY,
      policyId: result.policy.id,
    };
  }

  /**
   * Caller context overlaid with the principal's attributes, which win on
   * key collisions, plus `principalId`.
   */
  private async enrichContext(
    principalId: string,
    context: RequestContext,
    signal?: AbortSignal,
  ): Promise<RequestContext> {
    const principal = await retryTransient(
      () => this.principals.findById(principalId, signal),
      "principals.findById",
      { ...this.retry, signal },
    );
    return {
      ...context,
      ...(principal?.attributes ?? {}),
      principalId,
    };
  }
}
