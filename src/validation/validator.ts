import { validationOptionsSchema, type CheckName, type ValidationOptionsInput } from "../config/schema.js";
import type { TraceabilityGraph } from "../graph/traceability-graph.js";
import { ConfigError } from "../errors.js";
import { formatZodIssues } from "../utils/zod.js";
import { checkChildLinkage, checkEmptyDocuments, checkUnlinkedItems } from "./completeness.js";
import { checkEmptyText, checkLinkValidity, checkReviewStatus, checkSuspectLinks } from "./content.js";
import type { Check, CheckContext } from "./context.js";
import { escalate } from "./severity.js";
import { checkDocumentHierarchy, checkItemCycles, checkLinkConformance } from "./structural.js";
import type { ValidationIssue } from "./types.js";

/** Toggleable checks in the order they run. */
export const CHECKS: ReadonlyArray<readonly [CheckName, Check]> = [
  ["itemCycles", checkItemCycles],
  ["linkConformance", checkLinkConformance],
  ["linkValidity", checkLinkValidity],
  ["suspectLinks", checkSuspectLinks],
  ["reviewStatus", checkReviewStatus],
  ["emptyText", checkEmptyText],
  ["childLinkage", checkChildLinkage],
  ["unlinkedItems", checkUnlinkedItems],
  ["emptyDocuments", checkEmptyDocuments],
];

/**
 * Run the document-hierarchy check and every enabled check, then apply
 * warnAll / errorAll. Returns all issues; never short-circuits.
 */
export function validate(graph: TraceabilityGraph, input: ValidationOptionsInput = {}): ValidationIssue[] {
  const parsed = validationOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid validation options: ${formatZodIssues(parsed.error)}`);
  }
  const options = parsed.data;
  const ctx: CheckContext = { graph, options, skip: new Set(options.skip) };

  const issues: ValidationIssue[] = [...checkDocumentHierarchy(graph)];
  for (const [name, check] of CHECKS) {
    if (options.checks[name]) issues.push(...check(ctx));
  }

  return escalate(issues, options);
}

/** Drop load-time issues raised for items of skipped documents. */
export function omitSkippedDocuments(issues: readonly ValidationIssue[], skip: readonly string[]): ValidationIssue[] {
  const skipped = new Set(skip);
  return issues.filter((entry) => {
    const document = entry.context.document;
    return typeof document !== "string" || !skipped.has(document);
  });
}
