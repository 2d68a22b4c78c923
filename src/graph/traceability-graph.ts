import { DocumentDag } from "../documents/dag.js";
import type { Item } from "../items/types.js";

/**
 * In-memory traceability graph: items keyed by uid, with parent and child
 * adjacency kept in step on every insert and removal, plus the document DAG.
 *
 * Links to uids that are not in the graph stay in `parentsOf`; validation
 * reports them rather than the graph dropping them.
 */
export class TraceabilityGraph {
  readonly dag: DocumentDag;
  private readonly itemMap = new Map<string, Item>();
  private readonly parents = new Map<string, string[]>();
  private readonly children = new Map<string, string[]>();

  constructor(dag: DocumentDag = new DocumentDag()) {
    this.dag = dag;
  }

  /** Insert or replace an item and refresh both adjacency views. */
  addItem(item: Item): void {
    if (this.itemMap.has(item.uid)) {
      this.detachParents(item.uid);
    }
    this.itemMap.set(item.uid, item);

    const parentUids = item.links.map((link) => link.parentUid);
    this.parents.set(item.uid, parentUids);
    if (!this.children.has(item.uid)) this.children.set(item.uid, []);

    for (const parentUid of parentUids) {
      const siblings = this.children.get(parentUid) ?? [];
      if (!siblings.includes(item.uid)) siblings.push(item.uid);
      this.children.set(parentUid, siblings);
    }
  }

  /** Remove an item. Items linking to it keep their (now dangling) links. */
  removeItem(uid: string): boolean {
    if (!this.itemMap.has(uid)) return false;
    this.detachParents(uid);
    this.itemMap.delete(uid);
    this.parents.delete(uid);
    if ((this.children.get(uid) ?? []).length === 0) this.children.delete(uid);
    return true;
  }

  /** Remove a document and every item in it. */
  removeDocument(prefix: string): Item[] {
    const removed = this.itemsInDocument(prefix);
    for (const item of removed) this.removeItem(item.uid);
    this.dag.removeDocument(prefix);
    return removed;
  }

  getItem(uid: string): Item | undefined {
    return this.itemMap.get(uid);
  }

  hasItem(uid: string): boolean {
    return this.itemMap.has(uid);
  }

  get items(): Item[] {
    return [...this.itemMap.values()];
  }

  get size(): number {
    return this.itemMap.size;
  }

  /** Parent uids of an item in link order, including unresolved ones. */
  parentsOf(uid: string): string[] {
    return [...(this.parents.get(uid) ?? [])];
  }

  /** Uids of items that link to this uid. */
  childrenOf(uid: string): string[] {
    return [...(this.children.get(uid) ?? [])];
  }

  /** Ancestor items, nearest first, each once. Missing uids are skipped. */
  ancestors(uid: string): Item[] {
    return this.traverse(uid, (current) => this.parents.get(current) ?? []);
  }

  /** Descendant items, nearest first, each once. */
  descendants(uid: string): Item[] {
    return this.traverse(uid, (current) => this.children.get(current) ?? []);
  }

  /** The item itself followed by its ancestors and descendants. */
  neighbors(uid: string): Item[] {
    const result: Item[] = [];
    const seen = new Set<string>();
    const self = this.itemMap.get(uid);
    const candidates = [...(self ? [self] : []), ...this.ancestors(uid), ...this.descendants(uid)];
    for (const item of candidates) {
      if (seen.has(item.uid)) continue;
      seen.add(item.uid);
      result.push(item);
    }
    return result;
  }

  itemsInDocument(prefix: string): Item[] {
    return this.items.filter((item) => item.documentPrefix === prefix);
  }

  childrenInDocument(uid: string, prefix: string): Item[] {
    return this.resolve(this.childrenOf(uid)).filter((item) => item.documentPrefix === prefix);
  }

  parentsInDocument(uid: string, prefix: string): Item[] {
    return this.resolve(this.parentsOf(uid)).filter((item) => item.documentPrefix === prefix);
  }

  /** Plain-object adjacency views, for snapshots. */
  adjacency(): { itemParents: Record<string, string[]>; itemChildren: Record<string, string[]> } {
    return {
      itemParents: Object.fromEntries([...this.parents].map(([uid, list]) => [uid, [...list]])),
      itemChildren: Object.fromEntries([...this.children].map(([uid, list]) => [uid, [...list]])),
    };
  }

  private resolve(uids: string[]): Item[] {
    const found: Item[] = [];
    for (const uid of uids) {
      const item = this.itemMap.get(uid);
      if (item) found.push(item);
    }
    return found;
  }

  private detachParents(uid: string): void {
    for (const parentUid of this.parents.get(uid) ?? []) {
      const siblings = this.children.get(parentUid);
      if (!siblings) continue;
      const remaining = siblings.filter((child) => child !== uid);
      if (remaining.length === 0 && !this.itemMap.has(parentUid)) {
        this.children.delete(parentUid);
      } else {
        this.children.set(parentUid, remaining);
      }
    }
  }

  // Worklist traversal over uid keys; cyclic links cannot recurse forever.
  private traverse(start: string, next: (uid: string) => string[]): Item[] {
    const result: Item[] = [];
    const visited = new Set<string>([start]);
    const queue = [...next(start)];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);
      const item = this.itemMap.get(current);
      if (!item) continue;
      result.push(item);
      queue.push(...next(current));
    }
    return result;
  }
}
