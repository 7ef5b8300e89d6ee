import { readFileSync } from "fs";
import { getConfig } from "../lib/config.js";
import { listStyles, resolveStyleRef } from "../registry/index.js";
import {
  checkDocument,
  formatFromPath,
  readStyleDocument,
  styleNameFromPath,
  formatRuleIssue,
  MalformedRuleError,
} from "../style/index.js";

const args = process.argv.slice(2);
const styleDir = getConfig().styleDir;

// No arguments: check everything in the style directory
const paths =
  args.length > 0
    ? args.map((ref) => resolveStyleRef(ref, styleDir) ?? ref)
    : listStyles(styleDir).map((entry) => entry.path);

if (paths.length === 0) {
  console.error(`No style files found in ${styleDir}`);
  process.exit(1);
}

let failed = false;

for (const path of paths) {
  console.log(path);

  let errors: string[];
  let warnings: string[];
  try {
    const name = styleNameFromPath(path);
    const doc = readStyleDocument(readFileSync(path, "utf-8"), formatFromPath(path), name);
    ({ errors, warnings } = checkDocument(doc, name));
  } catch (e) {
    if (e instanceof MalformedRuleError) {
      errors = e.issues.map(formatRuleIssue);
    } else if (e instanceof Error) {
      errors = [e.message];
    } else {
      throw e;
    }
    warnings = [];
  }

  for (const error of errors) console.log(`  ERROR    ${error}`);
  for (const warning of warnings) console.log(`  WARNING  ${warning}`);
  if (errors.length === 0 && warnings.length === 0) console.log("  OK");
  if (errors.length > 0) failed = true;
}

process.exit(failed ? 1 : 0);
