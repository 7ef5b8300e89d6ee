import { existsSync, readFileSync } from "fs";
import { basename, extname } from "path";
import { readSld } from "./sld.js";
import { parseStyleSheet } from "./parse.js";
import { findInconsistencies } from "./check.js";
import { MalformedRuleError, StyleError, StyleNotFoundError } from "./errors.js";
import { log } from "./log.js";
import type { StyleSheet } from "../types.js";

export type StyleFormat = "sld" | "json";

export function formatFromPath(path: string): StyleFormat {
  const ext = extname(path).toLowerCase();
  if (ext === ".sld" || ext === ".xml") return "sld";
  if (ext === ".json") return "json";
  throw new StyleError(`Unsupported style file extension "${ext}" (expected .sld, .xml or .json): ${path}`);
}

/**
 * Turn style text into a raw document. Syntax errors surface as
 * MalformedRuleError so callers only deal with one failure type.
 */
export function readStyleDocument(text: string, format: StyleFormat, fallbackName: string): unknown {
  try {
    return format === "sld" ? readSld(text, fallbackName) : JSON.parse(text);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new MalformedRuleError(fallbackName, [
      { ruleIndex: -1, message: `cannot read ${format.toUpperCase()}: ${message}` },
    ]);
  }
}

export function parseStyleText(text: string, format: StyleFormat, fallbackName: string): StyleSheet {
  return parseStyleSheet(readStyleDocument(text, format, fallbackName), fallbackName);
}

export function styleNameFromPath(path: string): string {
  return basename(path, extname(path));
}

/**
 * Read, validate and check a style file. Malformed files abort with
 * MalformedRuleError; consistency findings are logged and the sheet is
 * returned exactly as written.
 */
export function loadStyleSheet(path: string): StyleSheet {
  if (!existsSync(path)) {
    throw new StyleNotFoundError(path);
  }

  const format = formatFromPath(path);
  const text = readFileSync(path, "utf-8");
  const sheet = parseStyleText(text, format, styleNameFromPath(path));

  log.styleLoaded(path, sheet);
  for (const warning of findInconsistencies(sheet)) {
    log.inconsistency(sheet.name, warning);
  }

  return sheet;
}

export { evaluate, createEvaluator, findRule, toStyle } from "./evaluate.js";
export type { Evaluator } from "./evaluate.js";
export { evaluatePredicate, predicateInterval, describePredicate } from "./predicate.js";
export { parseStyleSheet, normalizeColor } from "./parse.js";
export { checkDocument, findInconsistencies, coverageGaps } from "./check.js";
export { StyleError, NoMatchError, MalformedRuleError, StyleNotFoundError, formatRuleIssue } from "./errors.js";
export type { RuleIssue } from "./errors.js";
