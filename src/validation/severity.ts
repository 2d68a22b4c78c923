import type { IssueLevel, ValidationIssue } from "./types.js";

export interface EscalationOptions {
  /** Report info issues as warnings. */
  warnAll?: boolean;
  /** Report warnings as errors. With warnAll, info issues become errors too. */
  errorAll?: boolean;
}

export function escalateLevel(level: IssueLevel, options: EscalationOptions): IssueLevel {
  let result = level;
  if (options.warnAll && result === "info") result = "warning";
  if (options.errorAll && result === "warning") result = "error";
  return result;
}

/** Returns new issues with promoted levels. The input is left as is. */
export function escalate(issues: readonly ValidationIssue[], options: EscalationOptions): ValidationIssue[] {
  return issues.map((entry) => {
    const level = escalateLevel(entry.level, options);
    return level === entry.level ? entry : { ...entry, level };
  });
}

export function hasErrors(issues: readonly ValidationIssue[]): boolean {
  return issues.some((entry) => entry.level === "error");
}

/** 1 when any error-level issue is present, else 0. */
export function exitCodeFor(issues: readonly ValidationIssue[]): number {
  return hasErrors(issues) ? 1 : 0;
}

export interface IssueCounts {
  error: number;
  warning: number;
  info: number;
}

export function countIssues(issues: readonly ValidationIssue[]): IssueCounts {
  const counts: IssueCounts = { error: 0, warning: 0, info: 0 };
  for (const entry of issues) counts[entry.level] += 1;
  return counts;
}
