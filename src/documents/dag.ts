import type { DocumentNode, MissingParent, TopologicalResult } from "./types.js";

/**
 * Document-level hierarchy: prefix → parent prefixes.
 *
 * Parent references to prefixes that are not part of the DAG are kept (so they
 * can be reported) but ignored by every traversal and by the topological sort.
 */
export class DocumentDag {
  private readonly parentMap = new Map<string, string[]>();

  constructor(nodes: Iterable<DocumentNode> = []) {
    for (const node of nodes) {
      this.setParents(node.prefix, node.parents);
    }
  }

  /** Add a document or replace its parent list. */
  setParents(prefix: string, parents: readonly string[]): void {
    this.parentMap.set(prefix, [...new Set(parents)]);
  }

  removeDocument(prefix: string): boolean {
    return this.parentMap.delete(prefix);
  }

  has(prefix: string): boolean {
    return this.parentMap.has(prefix);
  }

  /** Document prefixes in insertion order. */
  get prefixes(): string[] {
    return [...this.parentMap.keys()];
  }

  get size(): number {
    return this.parentMap.size;
  }

  /** Declared parents, including ones that are not in the DAG. */
  parentsOf(prefix: string): string[] {
    return [...(this.parentMap.get(prefix) ?? [])];
  }

  childrenOf(prefix: string): string[] {
    const children: string[] = [];
    for (const [child, parents] of this.parentMap) {
      if (parents.includes(prefix)) children.push(child);
    }
    return children;
  }

  roots(): string[] {
    return this.prefixes.filter((prefix) => this.knownParents(prefix).length === 0);
  }

  leaves(): string[] {
    const withChildren = new Set<string>();
    for (const prefix of this.prefixes) {
      for (const parent of this.knownParents(prefix)) withChildren.add(parent);
    }
    return this.prefixes.filter((prefix) => !withChildren.has(prefix));
  }

  isLeaf(prefix: string): boolean {
    return this.childrenOf(prefix).length === 0;
  }

  isRoot(prefix: string): boolean {
    return this.knownParents(prefix).length === 0;
  }

  /** Transitive parents, nearest first. Safe on cyclic input. */
  ancestorsOf(prefix: string): string[] {
    return this.walk(prefix, (p) => this.knownParents(p));
  }

  /** Transitive children, nearest first. Safe on cyclic input. */
  descendantsOf(prefix: string): string[] {
    return this.walk(prefix, (p) => this.childrenOf(p));
  }

  isAncestor(ancestor: string, prefix: string): boolean {
    return this.ancestorsOf(prefix).includes(ancestor);
  }

  /** Parent references that point at prefixes outside the DAG. */
  missingParents(): MissingParent[] {
    const missing: MissingParent[] = [];
    for (const [prefix, parents] of this.parentMap) {
      for (const parent of parents) {
        if (!this.parentMap.has(parent)) missing.push({ prefix, parent });
      }
    }
    return missing;
  }

  /**
   * Kahn's algorithm. Among documents that become eligible at the same time the
   * smallest prefix goes first, so the order is deterministic. Documents left
   * over are split into the ones that lie on a cycle and the ones that only
   * descend from one.
   */
  topologicalSort(): TopologicalResult {
    const inDegree = new Map<string, number>();
    const children = new Map<string, string[]>();
    for (const prefix of this.parentMap.keys()) {
      inDegree.set(prefix, 0);
      children.set(prefix, []);
    }
    for (const prefix of this.parentMap.keys()) {
      for (const parent of this.knownParents(prefix)) {
        inDegree.set(prefix, (inDegree.get(prefix) ?? 0) + 1);
        children.get(parent)?.push(prefix);
      }
    }

    const ready = [...inDegree].filter(([, degree]) => degree === 0).map(([prefix]) => prefix);
    const order: string[] = [];

    while (ready.length > 0) {
      ready.sort(comparePrefixes);
      const next = ready.shift();
      if (next === undefined) break;
      order.push(next);
      for (const child of children.get(next) ?? []) {
        const remaining = (inDegree.get(child) ?? 0) - 1;
        inDegree.set(child, remaining);
        if (remaining === 0) ready.push(child);
      }
    }

    const placed = new Set(order);
    const leftover = this.prefixes.filter((prefix) => !placed.has(prefix)).sort(comparePrefixes);
    const cyclic = leftover.filter((prefix) => this.reachesItself(prefix));
    const blocked = leftover.filter((prefix) => !cyclic.includes(prefix));
    return { order, cyclic, blocked };
  }

  /** Prefixes that lie on a cycle. Empty when the hierarchy is acyclic. */
  findCycles(): string[] {
    return this.topologicalSort().cyclic;
  }

  /** Plain prefix → parents record, for snapshots. */
  toRecord(): Record<string, string[]> {
    const record: Record<string, string[]> = {};
    for (const [prefix, parents] of this.parentMap) {
      record[prefix] = [...parents];
    }
    return record;
  }

  private knownParents(prefix: string): string[] {
    return (this.parentMap.get(prefix) ?? []).filter((parent) => this.parentMap.has(parent));
  }

  private reachesItself(prefix: string): boolean {
    const seen = new Set<string>();
    const queue = this.knownParents(prefix);
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || seen.has(current)) continue;
      if (current === prefix) return true;
      seen.add(current);
      queue.push(...this.knownParents(current));
    }
    return false;
  }

  private walk(start: string, next: (prefix: string) => string[]): string[] {
    const seen = new Set<string>([start]);
    const result: string[] = [];
    const queue = [...next(start)];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || seen.has(current)) continue;
      seen.add(current);
      result.push(current);
      queue.push(...next(current));
    }
    return result;
  }
}

function comparePrefixes(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
