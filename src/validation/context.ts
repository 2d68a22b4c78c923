import type { ValidationOptions } from "../config/schema.js";
import type { TraceabilityGraph } from "../graph/traceability-graph.js";
import type { Item } from "../items/types.js";
import type { IssueCode, IssueLevel, ValidationIssue } from "./types.js";

/** Everything a check reads. Checks never write to it. */
export interface CheckContext {
  graph: TraceabilityGraph;
  options: ValidationOptions;
  skip: ReadonlySet<string>;
}

export type Check = (ctx: CheckContext) => ValidationIssue[];

export function issue(
  level: IssueLevel,
  code: IssueCode,
  subject: string,
  message: string,
  context: Record<string, unknown> = {},
): ValidationIssue {
  return { level, code, subject, message, context };
}

/** Active items outside skipped documents, sorted by uid. */
export function subjectItems(ctx: CheckContext): Item[] {
  return ctx.graph.items
    .filter((item) => item.active && !ctx.skip.has(item.documentPrefix))
    .sort((a, b) => (a.uid < b.uid ? -1 : a.uid > b.uid ? 1 : 0));
}
