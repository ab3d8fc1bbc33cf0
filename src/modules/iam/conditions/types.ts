/**
 * Condition AST for policy predicates.
 *
 * Raw policy conditions arrive as loosely typed JSON maps with
 * suffix-encoded operators (`amount.gt`, `location.in`). They are parsed
 * once, when a policy is built, into the closed variant below.
 */

// ============================================================================
// Context
// ============================================================================

export type ContextScalar = string | number | boolean | null;

export type ContextValue = ContextScalar | ContextScalar[];

/**
 * Flat, string-keyed request context supplied by the caller and enriched
 * with principal attributes before evaluation.
 */
export type RequestContext = Record<string, ContextValue>;

// ============================================================================
// Raw (JSON) form
// ============================================================================

export interface RawConditions {
  [key: string]: unknown;
}

// ============================================================================
// Parsed form
// ============================================================================

export type ComparisonOperator = "gt" | "gte" | "lt" | "lte";

export type MembershipOperator = "in" | "contains";

export interface EqualsNode {
  kind: "Equals";
  field: string;
  expected: ContextValue;
  /** `.ne` is parsed as a negated equality */
  negated: boolean;
}

export interface CompareNode {
  kind: "Compare";
  field: string;
  op: ComparisonOperator;
  expected: ContextValue;
}

export interface MembershipNode {
  kind: "Membership";
  field: string;
  op: MembershipOperator;
  expected: ContextValue;
}

export interface AndNode {
  kind: "And";
  children: ConditionNode[];
}

export interface OrNode {
  kind: "Or";
  children: ConditionNode[];
}

export interface TimeRangeNode {
  kind: "TimeRange";
  /** Seconds since midnight, inclusive */
  startSeconds: number;
  /** Seconds since midnight, exclusive */
  endSeconds: number;
  timezone: string;
}

export type ConditionNode =
  | EqualsNode
  | CompareNode
  | MembershipNode
  | AndNode
  | OrNode
  | TimeRangeNode;

export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = [
  "gt",
  "gte",
  "lt",
  "lte",
];

export const MEMBERSHIP_OPERATORS: readonly MembershipOperator[] = [
  "in",
  "contains",
];
