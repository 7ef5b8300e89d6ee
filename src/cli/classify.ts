import { getConfig } from "../lib/config.js";
import { evaluate, NoMatchError } from "../style/index.js";
import { log } from "../style/log.js";
import { openStyle } from "./shared.js";

const [styleRef, ...rawValues] = process.argv.slice(2);

if (!styleRef || rawValues.length === 0) {
  console.error("Usage: tsx src/cli/classify.ts <style.sld|style.json|geolevel_subject> <value> [value...]");
  console.error("  geolevel_subject names are looked up in STYLE_DIR (default: ./styles)");
  process.exit(1);
}

const opened = openStyle(styleRef, getConfig().styleDir);
if (!opened.ok) {
  console.error(opened.error);
  process.exit(1);
}
const { sheet } = opened;

for (const raw of rawValues) {
  const value = Number(raw);
  if (raw.trim() === "" || Number.isNaN(value)) {
    console.error(`Not a number: "${raw}"`);
    process.exitCode = 1;
    continue;
  }

  try {
    const style = evaluate(sheet, value);
    log.evaluation(sheet.name, value, style);
    console.log(JSON.stringify({ value, ...style }));
  } catch (e) {
    if (!(e instanceof NoMatchError)) throw e;
    log.evaluation(sheet.name, value, undefined);
    console.log(JSON.stringify({ value, error: e.message }));
    process.exitCode = 2;
  }
}
