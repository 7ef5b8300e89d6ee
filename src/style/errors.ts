export class StyleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NoMatchError extends StyleError {
  readonly value: number;
  readonly sheetName: string;

  constructor(value: number, sheetName: string) {
    super(`No rule in style "${sheetName}" matches value ${value}`);
    this.value = value;
    this.sheetName = sheetName;
  }
}

export interface RuleIssue {
  /** Index of the offending rule, or -1 for sheet-level problems. */
  ruleIndex: number;
  title?: string;
  message: string;
}

export class MalformedRuleError extends StyleError {
  readonly sheetName: string;
  readonly issues: RuleIssue[];

  constructor(sheetName: string, issues: RuleIssue[]) {
    super(`Style "${sheetName}" is malformed:\n${issues.map(formatIssue).join("\n")}`);
    this.sheetName = sheetName;
    this.issues = issues;
  }
}

export class StyleNotFoundError extends StyleError {
  readonly path: string;

  constructor(path: string) {
    super(`Style file not found: ${path}`);
    this.path = path;
  }
}

/** One-line form used by the CLI and checkDocument(). */
export function formatRuleIssue(issue: RuleIssue): string {
  return issue.ruleIndex < 0 ? issue.message : `rule ${issue.ruleIndex}: ${issue.message}`;
}

function formatIssue(issue: RuleIssue): string {
  if (issue.ruleIndex < 0) return `  - ${issue.message}`;
  const label = issue.title ? `rule ${issue.ruleIndex} ("${issue.title}")` : `rule ${issue.ruleIndex}`;
  return `  - ${label}: ${issue.message}`;
}
