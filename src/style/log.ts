import { getConfig } from "../lib/config.js";
import { describePredicate } from "./predicate.js";
import type { Style, StyleSheet } from "../types.js";

function ts(): string {
  return new Date().toISOString();
}

function enabled(level: "normal" | "verbose"): boolean {
  const current = getConfig().logLevel;
  if (current === "quiet") return false;
  return level === "normal" || current === "verbose";
}

function line(label: string, detail?: string) {
  const msg = detail ? `[${ts()}] ${label}: ${detail}` : `[${ts()}] ${label}`;
  console.error(msg);
}

function separator() {
  console.error("─".repeat(72));
}

export const log = {
  styleLoaded(path: string, sheet: StyleSheet) {
    if (!enabled("normal")) return;
    separator();
    line("Style loaded", sheet.name);
    line("  File", path);
    line("  Property", sheet.property);
    line("  Rules", String(sheet.rules.length));
    if (!enabled("verbose")) return;
    sheet.rules.forEach((rule, i) => {
      line(`    ${i}. ${rule.title}`, `${describePredicate(rule.predicate, sheet.property)} → fill ${rule.fillColor}, stroke ${rule.strokeColor} ${rule.strokeWidth}px`);
    });
  },

  inconsistency(sheetName: string, warning: string) {
    if (!enabled("normal")) return;
    line(`  WARNING (${sheetName})`, warning);
  },

  styleMissing(path: string) {
    if (!enabled("normal")) return;
    separator();
    line("WARNING: style file could not be loaded", path);
    line("  Style files are named according to the \"geolevel_subject.sld\" convention");
  },

  evaluation(sheetName: string, value: number, style: Style | undefined) {
    if (!enabled("verbose")) return;
    line(`  Evaluate (${sheetName})`, style ? `${value} → "${style.title}" ${style.fillColorHex}` : `${value} → no match`);
  },
};
