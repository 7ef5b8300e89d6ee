import { existsSync, readdirSync } from "fs";
import { resolve } from "path";
import { loadStyleSheet } from "../style/index.js";
import { log } from "../style/log.js";
import type { StyleSheet } from "../types.js";
import type { StyleEntry } from "./types.js";

const STYLE_FILE = /^([^_]+)_(.+)\.(sld|json)$/;

export function styleFileName(geolevel: string, subject: string, ext: "sld" | "json" = "sld"): string {
  return `${geolevel}_${subject}.${ext}`;
}

export function findStyleFile(styleDir: string, geolevel: string, subject: string): string | undefined {
  for (const ext of ["sld", "json"] as const) {
    const path = resolve(styleDir, styleFileName(geolevel, subject, ext));
    if (existsSync(path)) return path;
  }
  return undefined;
}

export function listStyles(styleDir: string): StyleEntry[] {
  if (!existsSync(styleDir)) return [];
  return readdirSync(styleDir)
    .sort()
    .flatMap((f): StyleEntry[] => {
      const m = STYLE_FILE.exec(f);
      if (!m) return [];
      return [{ geolevel: m[1], subject: m[2], path: resolve(styleDir, f), format: m[3] === "sld" ? "sld" : "json" }];
    });
}

/**
 * Load the style for a geolevel/subject pair. A missing file is not an
 * error here: it is logged and undefined is returned so the caller can fall
 * back to an unclassified style. Malformed files still throw.
 */
export function loadLayerStyle(styleDir: string, geolevel: string, subject: string): StyleSheet | undefined {
  const path = findStyleFile(styleDir, geolevel, subject);
  if (!path) {
    log.styleMissing(resolve(styleDir, styleFileName(geolevel, subject)));
    return undefined;
  }
  return loadStyleSheet(path);
}

/**
 * Resolve a style reference given on the command line: an existing file
 * path, or a "geolevel_subject" name looked up in the style directory.
 */
export function resolveStyleRef(ref: string, styleDir: string): string | undefined {
  if (existsSync(ref)) return resolve(ref);
  const m = /^([^_/\\]+)_([^/\\]+)$/.exec(ref);
  if (!m) return undefined;
  return findStyleFile(styleDir, m[1], m[2]);
}
