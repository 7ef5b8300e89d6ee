import { resolveStyleRef } from "../registry/index.js";
import { loadStyleSheet, StyleError } from "../style/index.js";
import type { StyleSheet } from "../types.js";

export type OpenedStyle = { ok: true; sheet: StyleSheet } | { ok: false; error: string };

/**
 * Resolve and load a style named on the command line. Style errors come back
 * as a message for the CLI to print; anything else is rethrown.
 */
export function openStyle(ref: string, styleDir: string): OpenedStyle {
  const path = resolveStyleRef(ref, styleDir);
  if (!path) {
    return { ok: false, error: `No style found for "${ref}" in ${styleDir}` };
  }
  try {
    return { ok: true, sheet: loadStyleSheet(path) };
  } catch (e) {
    if (e instanceof StyleError) return { ok: false, error: e.message };
    throw e;
  }
}
