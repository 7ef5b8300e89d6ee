import type { Interval, Predicate } from "../types.js";

export function evaluatePredicate(predicate: Predicate, value: number): boolean {
  switch (predicate.type) {
    case "greater_or_equal":
      return value >= predicate.threshold;
    case "less_than":
      return value < predicate.threshold;
    case "and":
      return evaluatePredicate(predicate.left, value) && evaluatePredicate(predicate.right, value);
    default: {
      const unknown: never = predicate;
      throw new Error(`Unknown predicate type: ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * The set of values a predicate accepts. Every predicate in the supported
 * subset reduces to a single half-open interval, possibly empty.
 */
export function predicateInterval(predicate: Predicate): Interval {
  switch (predicate.type) {
    case "greater_or_equal":
      return { lower: predicate.threshold, upper: Infinity };
    case "less_than":
      return { lower: -Infinity, upper: predicate.threshold };
    case "and": {
      const left = predicateInterval(predicate.left);
      const right = predicateInterval(predicate.right);
      return {
        lower: Math.max(left.lower, right.lower),
        upper: Math.min(left.upper, right.upper),
      };
    }
  }
}

export function isEmptyInterval(interval: Interval): boolean {
  return interval.lower >= interval.upper;
}

export function formatInterval(interval: Interval): string {
  const lower = interval.lower === -Infinity ? "-∞" : String(interval.lower);
  const upper = interval.upper === Infinity ? "∞" : String(interval.upper);
  return `[${lower}, ${upper})`;
}

export function describePredicate(predicate: Predicate, property: string): string {
  switch (predicate.type) {
    case "greater_or_equal":
      return `${property} >= ${predicate.threshold}`;
    case "less_than":
      return `${property} < ${predicate.threshold}`;
    case "and":
      return `${describePredicate(predicate.left, property)} AND ${describePredicate(predicate.right, property)}`;
  }
}
