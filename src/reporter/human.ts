import { countIssues } from "../validation/severity.js";
import type { IssueLevel, ValidationIssue } from "../validation/types.js";

export interface HumanReportOptions {
  /** Include info-level issues. */
  verbose?: boolean;
  /** Show errors only. */
  quiet?: boolean;
}

const LEVEL_RANK: Record<IssueLevel, number> = { error: 0, warning: 1, info: 2 };

export function formatIssue(issue: ValidationIssue): string {
  return `[${issue.level.toUpperCase()}] ${issue.subject} ${issue.message}`;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function formatSummary(issues: readonly ValidationIssue[]): string {
  const counts = countIssues(issues);
  if (counts.error > 0) return `Validation failed with ${plural(counts.error, "error")}`;
  if (counts.warning > 0) return `Validation passed with ${plural(counts.warning, "warning")}`;
  return "Validation passed - no issues found";
}

/** Issues grouped by level (errors first), then a one-line summary. */
export function formatHumanReport(issues: readonly ValidationIssue[], options: HumanReportOptions = {}): string {
  const shown = issues
    .filter((issue) => {
      if (options.quiet) return issue.level === "error";
      return issue.level !== "info" || options.verbose === true;
    })
    .map((issue, index) => ({ issue, index }))
    .sort((a, b) => LEVEL_RANK[a.issue.level] - LEVEL_RANK[b.issue.level] || a.index - b.index)
    .map(({ issue }) => formatIssue(issue));

  const lines = [...shown];
  if (lines.length > 0) lines.push("");
  lines.push(formatSummary(issues));
  return lines.join("\n");
}
