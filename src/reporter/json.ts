import { countIssues, hasErrors, type IssueCounts } from "../validation/severity.js";
import type { ValidationIssue } from "../validation/types.js";

export interface JsonReport {
  passed: boolean;
  counts: IssueCounts;
  issues: ValidationIssue[];
}

export function buildJsonReport(issues: readonly ValidationIssue[]): JsonReport {
  return { passed: !hasErrors(issues), counts: countIssues(issues), issues: [...issues] };
}

export function formatJsonReport(issues: readonly ValidationIssue[]): string {
  return JSON.stringify(buildJsonReport(issues), null, 2);
}
