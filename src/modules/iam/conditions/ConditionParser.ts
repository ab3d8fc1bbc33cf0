/**
 * Condition Parser
 *
 * Turns the JSON condition vocabulary into a ConditionNode tree:
 *
 *   { "department": "Engineering" }                  equality
 *   { "amount.lt": 10000 }                           comparison
 *   { "location.in": ["HQ", "Branch"] }              membership
 *   { "$or": [{ ... }, { ... }] }                    combinators
 *   { "$timeRange": { "start": "09:00", "end": "17:00", "timezone": "UTC" } }
 *
 * Several keys in one object form an implicit AND. Shape errors raise
 * ValidationError here; literal values are only checked when evaluated.
 */

import { ValidationError } from "../../../shared/errors";
import {
  COMPARISON_OPERATORS,
  ComparisonOperator,
  ConditionNode,
  ContextScalar,
  ContextValue,
  MEMBERSHIP_OPERATORS,
  MembershipOperator,
  RawConditions,
  TimeRangeNode,
} from "./types";

const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

export const DEFAULT_TIMEZONE = "UTC";

function isPlainObject(value: unknown): value is RawConditions {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): value is ContextScalar {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

function isComparisonOperator(op: string): op is ComparisonOperator {
  return COMPARISON_OPERATORS.some((candidate) => candidate === op);
}

function isMembershipOperator(op: string): op is MembershipOperator {
  return MEMBERSHIP_OPERATORS.some((candidate) => candidate === op);
}

/**
 * Parse "HH:mm" or "HH:mm:ss" into seconds since midnight.
 */
export function parseTimeOfDay(value: string): number | null {
  const match = value.trim().match(TIME_OF_DAY);
  if (!match) {
    return null;
  }
  const [, hours, minutes, seconds] = match;
  return (
    parseInt(hours, 10) * 3600 +
    parseInt(minutes, 10) * 60 +
    (seconds ? parseInt(seconds, 10) : 0)
  );
}

export class ConditionParser {
  /**
   * Parse a condition map. `null` or `undefined` yield a tree that
   * matches everything, as does `{}`.
   */
  parse(raw: unknown): ConditionNode {
    if (raw === null || raw === undefined) {
      return { kind: "And", children: [] };
    }
    if (!isPlainObject(raw)) {
      throw new ValidationError("Policy conditions must be a JSON object");
    }
    return this.parseObject(raw, "");
  }

  /**
   * Parse conditions stored as a JSON document.
   */
  parseJson(text: string): ConditionNode {
    if (!text.trim()) {
      return this.parse(null);
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ValidationError("Policy conditions are not valid JSON", {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    return this.parse(raw);
  }

  private parseObject(raw: RawConditions, path: string): ConditionNode {
    const children = Object.entries(raw).map(([key, value]) =>
      this.parseEntry(key, value, path ? `${path}.${key}` : key),
    );
    if (children.length === 1) {
      return children[0];
    }
    return { kind: "And", children };
  }

  private parseEntry(key: string, value: unknown, path: string): ConditionNode {
    if (key.startsWith("$")) {
      return this.parseCombinator(key, value, path);
    }

    const separator = key.lastIndexOf(".");
    if (separator === -1) {
      return {
        kind: "Equals",
        field: key,
        expected: this.parseLiteral(value, path),
        negated: false,
      };
    }

    const field = key.slice(0, separator);
    const op = key.slice(separator + 1).toLowerCase();
    if (!field) {
      throw new ValidationError(`Condition key "${key}" has no field name`, {
        path,
      });
    }
    const expected = this.parseLiteral(value, path);

    if (op === "eq" || op === "ne") {
      return { kind: "Equals", field, expected, negated: op === "ne" };
    }
    if (isComparisonOperator(op)) {
      return { kind: "Compare", field, op, expected };
    }
    if (isMembershipOperator(op)) {
      return { kind: "Membership", field, op, expected };
    }
    throw new ValidationError(`Unsupported condition operator "${op}"`, {
      path,
    });
  }

  private parseCombinator(
    key: string,
    value: unknown,
    path: string,
  ): ConditionNode {
    switch (key.toLowerCase()) {
      case "$and":
      case "$or": {
        if (!Array.isArray(value)) {
          throw new ValidationError(`${key} expects an array of conditions`, {
            path,
          });
        }
        const children = value.map((child, index) => {
          if (!isPlainObject(child)) {
            throw new ValidationError(`${key} entries must be objects`, {
              path: `${path}[${index}]`,
            });
          }
          return this.parseObject(child, `${path}[${index}]`);
        });
        return key.toLowerCase() === "$and"
          ? { kind: "And", children }
          : { kind: "Or", children };
      }
      case "$timerange":
        return this.parseTimeRange(value, path);
      default:
        throw new ValidationError(`Unsupported condition combinator "${key}"`, {
          path,
        });
    }
  }

  private parseTimeRange(value: unknown, path: string): TimeRangeNode {
    if (!isPlainObject(value)) {
      throw new ValidationError("$timeRange expects an object", { path });
    }

    const fields = new Map(
      Object.entries(value).map(([k, v]) => [k.toLowerCase(), v]),
    );
    const start = fields.get("start");
    const end = fields.get("end");
    const timezone = fields.get("timezone");

    const startSeconds = typeof start === "string" ? parseTimeOfDay(start) : null;
    const endSeconds = typeof end === "string" ? parseTimeOfDay(end) : null;
    if (startSeconds === null || endSeconds === null) {
      throw new ValidationError(
        "$timeRange requires start and end as HH:mm or HH:mm:ss",
        { path },
      );
    }
    if (timezone !== undefined && timezone !== null) {
      if (typeof timezone !== "string" || !timezone.trim()) {
        throw new ValidationError("$timeRange timezone must be a string", {
          path,
        });
      }
    }

    return {
      kind: "TimeRange",
      startSeconds,
      endSeconds,
      timezone:
        typeof timezone === "string" ? timezone.trim() : DEFAULT_TIMEZONE,
    };
  }

  private parseLiteral(value: unknown, path: string): ContextValue {
    if (isScalar(value)) {
      return value;
    }
    if (Array.isArray(value)) {
      const items: ContextScalar[] = [];
      for (const item of value) {
        if (!isScalar(item)) {
          throw new ValidationError("Condition lists may only hold scalars", {
            path,
          });
        }
        items.push(item);
      }
      return items;
    }
    throw new ValidationError("Condition values must be scalars or lists", {
      path,
    });
  }
}
