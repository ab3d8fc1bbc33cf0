/**
 * Condition Evaluator
 *
 * Evaluates a parsed condition tree against a flat request context.
 * Evaluation is pure: no I/O, no mutation, and the evaluation instant is
 * passed in by the caller. It fails closed: a missing context key, a value
 * that cannot be coerced or an unknown timezone all evaluate to false.
 */

import {
  CompareNode,
  ConditionNode,
  ContextScalar,
  ContextValue,
  EqualsNode,
  MembershipNode,
  RequestContext,
  TimeRangeNode,
} from "./types";

// ============================================================================
// Value helpers
// ============================================================================

function lookup(
  context: RequestContext,
  field: string,
): ContextValue | undefined {
  if (!Object.prototype.hasOwnProperty.call(context, field)) {
    return undefined;
  }
  return context[field];
}

function scalarsEqual(actual: ContextScalar, expected: ContextScalar): boolean {
  if (actual === null || expected === null) {
    return actual === expected;
  }
  if (typeof actual === "number" && typeof expected === "number") {
    return actual === expected;
  }
  if (typeof actual === "boolean" && typeof expected === "boolean") {
    return actual === expected;
  }
  return String(actual).toLowerCase() === String(expected).toLowerCase();
}

export function valuesEqual(actual: ContextValue, expected: ContextValue): boolean {
  if (Array.isArray(actual) || Array.isArray(expected)) {
    if (!Array.isArray(actual) || !Array.isArray(expected)) {
      return false;
    }
    return (
      actual.length === expected.length &&
      actual.every((item, index) => scalarsEqual(item, expected[index]))
    );
  }
  return scalarsEqual(actual, expected);
}

/**
 * Coerce to a finite number, or null when the value has no numeric reading.
 */
export function toNumber(value: ContextValue): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

// ============================================================================
// Time of day
// ============================================================================

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatterCache.set(timezone, formatter);
  }
  return formatter;
}

/**
 * Seconds since local midnight of `instant` in `timezone`, or null when the
 * zone is unknown.
 */
export function secondsOfDay(instant: Date, timezone: string): number | null {
  let formatter: Intl.DateTimeFormat;
  try {
    formatter = formatterFor(timezone);
  } catch (error) {
    if (error instanceof RangeError) {
      return null;
    }
    throw error;
  }

  let hours = 0;
  let minutes = 0;
  let seconds = 0;
  for (const part of formatter.formatToParts(instant)) {
    if (part.type === "hour") hours = parseInt(part.value, 10) % 24;
    if (part.type === "minute") minutes = parseInt(part.value, 10);
    if (part.type === "second") seconds = parseInt(part.value, 10);
  }
  return hours * 3600 + minutes * 60 + seconds;
}

// ============================================================================
// Condition Evaluator Class
// ============================================================================

export class ConditionEvaluator {
  evaluate(
    node: ConditionNode,
    context: RequestContext,
    evaluatedAt: Date,
  ): boolean {
    switch (node.kind) {
      case "And":
        return node.children.every((child) =>
          this.evaluate(child, context, evaluatedAt),
        );
      case "Or":
        return node.children.some((child) =>
          this.evaluate(child, context, evaluatedAt),
        );
      case "Equals":
        return this.evaluateEquals(node, context);
      case "Compare":
        return this.evaluateCompare(node, context);
      case "Membership":
        return this.evaluateMembership(node, context);
      case "TimeRange":
        return this.evaluateTimeRange(node, evaluatedAt);
    }
  }

  private evaluateEquals(node: EqualsNode, context: RequestContext): boolean {
    const actual = lookup(context, node.field);
    if (actual === undefined) {
      return false;
    }
    const equal = valuesEqual(actual, node.expected);
    return node.negated ? !equal : equal;
  }

  private evaluateCompare(node: CompareNode, context: RequestContext): boolean {
    const actual = lookup(context, node.field);
    if (actual === undefined) {
      return false;
    }
    const left = toNumber(actual);
    const right = toNumber(node.expected);
    if (left === null || right === null) {
      return false;
    }

    switch (node.op) {
      case "gt":
        return left > right;
      case "gte":
        return left >= right;
      case "lt":
        return left < right;
      case "lte":
        return left <= right;
    }
  }

  private evaluateMembership(
    node: MembershipNode,
    context: RequestContext,
  ): boolean {
    const actual = lookup(context, node.field);
    if (actual === undefined) {
      return false;
    }

    if (node.op === "in") {
      // Actual value (or any of its items) must appear in the expected list
      const expected = node.expected;
      if (!Array.isArray(expected)) {
        return false;
      }
      const candidates = Array.isArray(actual) ? actual : [actual];
      return candidates.some((candidate) =>
        expected.some((item) => scalarsEqual(candidate, item)),
      );
    }

    // contains: list membership, or case-insensitive substring of the
    // scalar's string form
    const expected = node.expected;
    if (Array.isArray(expected) || expected === null) {
      return false;
    }
    if (Array.isArray(actual)) {
      return actual.some((item) => scalarsEqual(item, expected));
    }
    if (actual === null) {
      return false;
    }
    return String(actual).toLowerCase().includes(String(expected).toLowerCase());
  }

  private evaluateTimeRange(node: TimeRangeNode, evaluatedAt: Date): boolean {
    const current = secondsOfDay(evaluatedAt, node.timezone);
    if (current === null) {
      return false;
    }
    if (node.startSeconds <= node.endSeconds) {
      return current >= node.startSeconds && current < node.endSeconds;
    }
    // Crosses midnight
    return current >= node.startSeconds || current < node.endSeconds;
  }
}
