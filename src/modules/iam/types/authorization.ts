/**
 * Which subsystem produced a decision
 */
export enum DecisionSource {
  NONE = "None",
  PERMISSION = "Permission",
  POLICY = "Policy",
  RELATIONSHIP = "Relationship",
}

/**
 * Outcome of an authorization request. A denial is a normal value, never
 * an exception.
 */
export interface AuthorizationDecision {
  isAllowed: boolean;
  reason: string;
  decisionSource: DecisionSource;
  /** Set when a policy decided */
  policyId?: string;
}
