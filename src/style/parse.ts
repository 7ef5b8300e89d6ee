import { z } from "zod";
import { MalformedRuleError } from "./errors.js";
import type { RuleIssue } from "./errors.js";
import type { Predicate, Rule, StyleSheet } from "../types.js";

export const DEFAULT_PROPERTY = "number";
export const DEFAULT_STROKE_WIDTH = 1;

type RawComparison = {
  type: "greater_or_equal" | "less_than";
  property?: string;
  threshold: number;
};

type RawPredicate = RawComparison | { type: "and"; operands: RawPredicate[] };

const thresholdSchema = z
  .number({ invalid_type_error: "threshold must be a number" })
  .finite("threshold must be finite");

const predicateSchema: z.ZodType<RawPredicate> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({
      type: z.literal("greater_or_equal"),
      property: z.string().min(1).optional(),
      threshold: thresholdSchema,
    }),
    z.object({
      type: z.literal("less_than"),
      property: z.string().min(1).optional(),
      threshold: thresholdSchema,
    }),
    z.object({
      type: z.literal("and"),
      operands: z.array(predicateSchema).length(2, "conjunction must have exactly two operands"),
    }),
  ])
);

const colorSchema = z
  .string({ invalid_type_error: "must be a hex color like #RRGGBB" })
  .trim()
  .regex(/^#(?:[0-9a-fA-F]{6}|[0-9a-fA-F]{3})$/, "must be a hex color like #RRGGBB")
  .transform(normalizeColor);

const ruleSchema = z.object({
  title: z.string().trim().min(1, "title must be a non-empty string"),
  predicate: predicateSchema,
  fillColor: colorSchema,
  strokeColor: colorSchema,
  strokeWidth: z
    .number({ invalid_type_error: "strokeWidth must be a number" })
    .finite()
    .nonnegative("strokeWidth must not be negative")
    .default(DEFAULT_STROKE_WIDTH),
  polygonSymbolizers: z
    .literal(1, { errorMap: () => ({ message: "a rule needs exactly one PolygonSymbolizer" }) })
    .optional(),
});

const sheetSchema = z.object({
  name: z.string().trim().min(1, "name must be a non-empty string"),
  property: z.string().trim().min(1).default(DEFAULT_PROPERTY),
  rules: z.array(z.unknown()).min(1, "a style needs at least one rule"),
});

/**
 * Expand #RGB to #RRGGBB and upper-case the digits.
 */
export function normalizeColor(color: string): string {
  const hex = color.slice(1);
  const full = hex.length === 3 ? hex.split("").map((c) => c + c).join("") : hex;
  return `#${full.toUpperCase()}`;
}

function formatZodIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

function toPredicate(raw: RawPredicate, property: string, issues: string[]): Predicate {
  if (raw.type === "and") {
    const [left, right] = raw.operands;
    return {
      type: "and",
      left: toPredicate(left, property, issues),
      right: toPredicate(right, property, issues),
    };
  }
  if (raw.property !== undefined && raw.property !== property) {
    issues.push(`predicate reads "${raw.property}" but the style classifies "${property}"`);
  }
  return { type: raw.type, threshold: raw.threshold };
}

function rawTitle(raw: unknown): string | undefined {
  if (raw && typeof raw === "object" && "title" in raw && typeof raw.title === "string") {
    return raw.title;
  }
  return undefined;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate a raw style document and build an immutable StyleSheet.
 * Every problem in the document is collected before throwing, so one
 * MalformedRuleError lists them all.
 */
export function parseStyleSheet(doc: unknown, fallbackName = "<unnamed>"): StyleSheet {
  const sheetResult = sheetSchema.safeParse(doc);
  if (!sheetResult.success) {
    const name =
      doc && typeof doc === "object" && "name" in doc && typeof doc.name === "string" && doc.name
        ? doc.name
        : fallbackName;
    throw new MalformedRuleError(
      name,
      sheetResult.error.issues.map((issue) => ({ ruleIndex: -1, message: formatZodIssue(issue) }))
    );
  }

  const { name, property } = sheetResult.data;
  const rules: Rule[] = [];
  const issues: RuleIssue[] = [];

  sheetResult.data.rules.forEach((raw, ruleIndex) => {
    const title = rawTitle(raw);
    const parsed = ruleSchema.safeParse(raw);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        issues.push({ ruleIndex, title, message: formatZodIssue(issue) });
      }
      return;
    }

    const predicateIssues: string[] = [];
    const predicate = toPredicate(parsed.data.predicate, property, predicateIssues);
    for (const message of predicateIssues) {
      issues.push({ ruleIndex, title, message });
    }

    rules.push({
      title: parsed.data.title,
      predicate,
      fillColor: parsed.data.fillColor,
      strokeColor: parsed.data.strokeColor,
      strokeWidth: parsed.data.strokeWidth,
    });
  });

  if (issues.length > 0) {
    throw new MalformedRuleError(name, issues);
  }

  return deepFreeze({ name, property, rules });
}
