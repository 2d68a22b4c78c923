import type { TraceabilityGraph } from "../graph/traceability-graph.js";
import { issue, subjectItems, type CheckContext } from "./context.js";
import type { ValidationIssue } from "./types.js";

/**
 * Document hierarchy must be acyclic and name only known parents. Always runs:
 * every other check assumes a well-ordered hierarchy.
 */
export function checkDocumentHierarchy(graph: TraceabilityGraph): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  const cyclic = graph.dag.findCycles();
  if (cyclic.length > 0) {
    issues.push(
      issue("error", "document-cycle", cyclic[0], `cycle detected among documents: ${cyclic.join(", ")}`, {
        prefixes: cyclic,
      }),
    );
  }

  for (const { prefix, parent } of graph.dag.missingParents()) {
    issues.push(
      issue("error", "unknown-parent-document", prefix, `parent document ${parent} does not exist`, { parent }),
    );
  }

  return issues;
}

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

interface Frame {
  uid: string;
  next: number;
}

/**
 * Three-color depth-first search over child → parent links. A link back to an
 * in-progress item closes a cycle, reported as the uid sequence of the loop.
 * Uses an explicit stack. Self-links are left to the link validity check.
 */
export function checkItemCycles(ctx: CheckContext): ValidationIssue[] {
  const nodes = subjectItems(ctx);
  const inScope = new Set(nodes.map((item) => item.uid));
  const neighbors = (uid: string): string[] =>
    ctx.graph.parentsOf(uid).filter((parent) => parent !== uid && inScope.has(parent));

  const color = new Map<string, number>();
  for (const uid of inScope) color.set(uid, WHITE);

  const issues: ValidationIssue[] = [];
  const reported = new Set<string>();

  for (const start of inScope) {
    if (color.get(start) !== WHITE) continue;

    const stack: Frame[] = [{ uid: start, next: 0 }];
    const path: string[] = [start];
    color.set(start, GRAY);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const parents = neighbors(frame.uid);

      if (frame.next >= parents.length) {
        color.set(frame.uid, BLACK);
        stack.pop();
        path.pop();
        continue;
      }

      const parent = parents[frame.next];
      frame.next += 1;
      const state = color.get(parent);

      if (state === GRAY) {
        const loop = [...path.slice(path.indexOf(parent)), parent];
        const key = [...new Set(loop)].sort().join(",");
        if (!reported.has(key)) {
          reported.add(key);
          issues.push(
            issue("error", "item-cycle", parent, `link cycle: ${loop.join(" -> ")}`, { cycle: loop }),
          );
        }
      } else if (state === WHITE) {
        color.set(parent, GRAY);
        stack.push({ uid: parent, next: 0 });
        path.push(parent);
      }
    }
  }

  return issues;
}

/**
 * A link must point into an ancestor document of the child's document, as
 * declared by the document DAG.
 */
export function checkLinkConformance(ctx: CheckContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const ancestorCache = new Map<string, string[]>();
  const ancestorsOf = (prefix: string): string[] => {
    let cached = ancestorCache.get(prefix);
    if (!cached) {
      cached = ctx.graph.dag.ancestorsOf(prefix);
      ancestorCache.set(prefix, cached);
    }
    return cached;
  };

  for (const item of subjectItems(ctx)) {
    const expected = ancestorsOf(item.documentPrefix);
    for (const link of item.links) {
      const target = ctx.graph.getItem(link.parentUid);
      if (!target || target.uid === item.uid) continue;
      if (expected.includes(target.documentPrefix)) continue;

      const hint =
        expected.length > 0
          ? `expected one of: ${expected.join(", ")}`
          : `document ${item.documentPrefix} has no ancestor documents`;
      issues.push(
        issue(
          "warning",
          "link-conformance",
          item.uid,
          `links to ${target.uid} in document ${target.documentPrefix}, which is not an ancestor of ${item.documentPrefix} (${hint})`,
          {
            parentUid: target.uid,
            childDocument: item.documentPrefix,
            parentDocument: target.documentPrefix,
            expected,
          },
        ),
      );
    }
  }

  return issues;
}
