import { evaluatePredicate } from "./predicate.js";
import { NoMatchError } from "./errors.js";
import type { Rule, Style, StyleSheet } from "../types.js";

export function toStyle(rule: Rule): Style {
  return {
    title: rule.title,
    fillColorHex: rule.fillColor,
    strokeColorHex: rule.strokeColor,
    strokeWidthPx: rule.strokeWidth,
  };
}

/**
 * First rule whose predicate accepts the value, in declaration order.
 * Returns undefined rather than throwing; see evaluate() for the strict form.
 */
export function findRule(sheet: StyleSheet, value: number): Rule | undefined {
  if (typeof value !== "number" || Number.isNaN(value)) return undefined;
  return sheet.rules.find((rule) => evaluatePredicate(rule.predicate, value));
}

export function evaluate(sheet: StyleSheet, value: number): Style {
  const rule = findRule(sheet, value);
  if (!rule) {
    throw new NoMatchError(value, sheet.name);
  }
  return toStyle(rule);
}

export type Evaluator = (value: number) => Style;

export function createEvaluator(sheet: StyleSheet): Evaluator {
  return (value) => evaluate(sheet, value);
}
