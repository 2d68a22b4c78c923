import { issue, subjectItems, type CheckContext } from "./context.js";
import type { ValidationIssue } from "./types.js";

/**
 * Requirements in a document that has child documents should be traced to by
 * at least one active item from a descendant document.
 */
export function checkChildLinkage(ctx: CheckContext): ValidationIssue[] {
  const { graph } = ctx;
  const level = ctx.options.severity.childLinkage;
  const issues: ValidationIssue[] = [];
  const descendantDocs = new Map<string, Set<string>>();

  for (const item of subjectItems(ctx)) {
    if (item.type !== "requirement") continue;
    const prefix = item.documentPrefix;
    if (!graph.dag.has(prefix) || graph.dag.isLeaf(prefix)) continue;

    const descendants = descendantDocs.get(prefix) ?? new Set(graph.dag.descendantsOf(prefix));
    descendantDocs.set(prefix, descendants);

    const traced = graph.childrenOf(item.uid).some((childUid) => {
      const child = graph.getItem(childUid);
      return child !== undefined && child.active && descendants.has(child.documentPrefix);
    });
    if (!traced) {
      issues.push(
        issue(level, "no-children", item.uid, "has no children linking to it from child documents", {
          childDocuments: graph.dag.childrenOf(prefix),
        }),
      );
    }
  }

  return issues;
}

/** Non-derived requirements outside root documents must link to a parent. */
export function checkUnlinkedItems(ctx: CheckContext): ValidationIssue[] {
  const { graph } = ctx;
  const level = ctx.options.severity.unlinkedItems;

  return subjectItems(ctx)
    .filter(
      (item) =>
        item.type === "requirement" &&
        !item.derived &&
        item.links.length === 0 &&
        graph.dag.has(item.documentPrefix) &&
        !graph.dag.isRoot(item.documentPrefix),
    )
    .map((item) =>
      issue(level, "unlinked-item", item.uid, "has no links to a parent document", {
        parentDocuments: graph.dag.parentsOf(item.documentPrefix),
      }),
    );
}

export function checkEmptyDocuments(ctx: CheckContext): ValidationIssue[] {
  const counts = new Map<string, number>();
  for (const item of ctx.graph.items) {
    counts.set(item.documentPrefix, (counts.get(item.documentPrefix) ?? 0) + 1);
  }

  return ctx.graph.dag.prefixes
    .filter((prefix) => !ctx.skip.has(prefix) && (counts.get(prefix) ?? 0) === 0)
    .sort()
    .map((prefix) => issue("warning", "empty-document", prefix, "document contains no items"));
}
