import { discoverDocuments, orderDocuments, type DiscoveryOptions } from "../documents/discovery.js";
import type { Document } from "../documents/types.js";
import { loadDocumentItems } from "../items/store.js";
import { issue } from "../validation/context.js";
import type { ValidationIssue } from "../validation/types.js";
import { TraceabilityGraph } from "./traceability-graph.js";

export interface BuildResult {
  graph: TraceabilityGraph;
  /** Load-time findings: bad document configs, unparseable items, item-format warnings. */
  issues: ValidationIssue[];
  /** Discovered documents keyed by prefix. */
  documents: Map<string, Document>;
  /** Absolute project root. */
  root: string;
}

/**
 * Discover documents under root and load their items parent-first.
 *
 * Throws DiscoveryError on duplicate prefixes or a cyclic document hierarchy,
 * and IOError on filesystem failures. A malformed item file becomes an
 * `item-parse-error` issue and the remaining items still load.
 */
export async function buildGraph(rootPath: string, options: DiscoveryOptions = {}): Promise<BuildResult> {
  const discovery = await discoverDocuments(rootPath, options);
  const issues: ValidationIssue[] = discovery.configErrors.map((err) => {
    const path = typeof err.details.path === "string" ? err.details.path : discovery.root;
    return issue("error", "config-error", path, err.message, { path });
  });

  const order = orderDocuments(discovery.dag);
  const graph = new TraceabilityGraph(discovery.dag);

  for (const prefix of order) {
    const doc = discovery.documents.get(prefix);
    if (!doc) continue;
    const loaded = await loadDocumentItems(doc);

    for (const failure of loaded.failures) {
      issues.push(
        issue("error", "item-parse-error", failure.uid, failure.error.message, {
          path: failure.path,
          document: prefix,
        }),
      );
    }
    for (const { item, warnings } of loaded.items) {
      for (const warning of warnings) {
        issues.push(issue("warning", "item-format", item.uid, warning, { document: prefix }));
      }
      graph.addItem(item);
    }
  }

  return { graph, issues, documents: discovery.documents, root: discovery.root };
}
