import { parseStyleSheet } from "./parse.js";
import { MalformedRuleError, formatRuleIssue } from "./errors.js";
import { describePredicate, formatInterval, isEmptyInterval, predicateInterval } from "./predicate.js";
import type { CheckResult, Interval, StyleSheet } from "../types.js";

/**
 * Sort and merge intervals. Touching half-open intervals ([a, b) and [b, c))
 * merge into one.
 */
export function mergeIntervals(intervals: Interval[]): Interval[] {
  const sorted = intervals
    .filter((i) => !isEmptyInterval(i))
    .sort((a, b) => a.lower - b.lower || a.upper - b.upper);

  const merged: Interval[] = [];
  for (const interval of sorted) {
    const last = merged[merged.length - 1];
    if (last && interval.lower <= last.upper) {
      last.upper = Math.max(last.upper, interval.upper);
    } else {
      merged.push({ ...interval });
    }
  }
  return merged;
}

/** Parts of the real line not covered by any of the intervals. */
export function coverageGaps(intervals: Interval[]): Interval[] {
  const gaps: Interval[] = [];
  let start = -Infinity;
  for (const piece of mergeIntervals(intervals)) {
    if (piece.lower > start) gaps.push({ lower: start, upper: piece.lower });
    start = Math.max(start, piece.upper);
  }
  if (start < Infinity) gaps.push({ lower: start, upper: Infinity });
  return gaps;
}

function intersect(a: Interval, b: Interval): Interval {
  return { lower: Math.max(a.lower, b.lower), upper: Math.min(a.upper, b.upper) };
}

/**
 * Static consistency pass over a parsed sheet. Reports rules that can never
 * match (empty or fully shadowed), overlaps resolved by rule order, and value
 * ranges no rule covers. The sheet itself is left exactly as written.
 */
export function findInconsistencies(sheet: StyleSheet): string[] {
  const warnings: string[] = [];
  const earlier: Interval[] = [];

  for (const rule of sheet.rules) {
    const interval = predicateInterval(rule.predicate);

    if (isEmptyInterval(interval)) {
      warnings.push(
        `Rule "${rule.title}" can never match: ${describePredicate(rule.predicate, sheet.property)} is empty`
      );
      continue;
    }

    const overlaps = mergeIntervals(earlier)
      .map((piece) => intersect(piece, interval))
      .filter((i) => !isEmptyInterval(i));

    if (overlaps.length === 1 && overlaps[0].lower === interval.lower && overlaps[0].upper === interval.upper) {
      warnings.push(`Rule "${rule.title}" is shadowed by earlier rules and can never match`);
    } else if (overlaps.length > 0) {
      warnings.push(
        `Rule "${rule.title}" overlaps earlier rules on ${overlaps.map(formatInterval).join(", ")}; the earlier rule wins`
      );
    }

    earlier.push(interval);
  }

  for (const gap of coverageGaps(earlier)) {
    warnings.push(`Values in ${formatInterval(gap)} match no rule`);
  }

  return warnings;
}

/**
 * Parse and check a raw document without throwing: malformed rules become
 * errors, consistency findings become warnings.
 */
export function checkDocument(doc: unknown, fallbackName?: string): CheckResult & { sheet?: StyleSheet } {
  let sheet: StyleSheet;
  try {
    sheet = parseStyleSheet(doc, fallbackName);
  } catch (e) {
    if (e instanceof MalformedRuleError) {
      return {
        valid: false,
        errors: e.issues.map(formatRuleIssue),
        warnings: [],
      };
    }
    throw e;
  }

  return { valid: true, errors: [], warnings: findInconsistencies(sheet), sheet };
}
