/** Settings stored in a document's `.reqgraph.yml`. */
export interface DocumentConfig {
  /** Unique uppercase identifier; every item uid starts with it. */
  prefix: string;
  /** Parent document prefixes. Empty for a root document. */
  parents: string[];
  /** Zero-padded width of the item sequence number (1-10). */
  digits: number;
  /** Separator between prefix and number. Never starts with a letter or digit. */
  sep: string;
}

/** A discovered document: its configuration plus the directory it lives in. */
export interface Document extends DocumentConfig {
  /** Absolute path of the document directory. */
  path: string;
}

/** Minimal shape the document hierarchy needs. */
export interface DocumentNode {
  prefix: string;
  parents: readonly string[];
}

/** Result of a Kahn-style topological sort. */
export interface TopologicalResult {
  /** Prefixes in parent-before-child order. */
  order: string[];
  /** Prefixes that lie on a cycle. Sorted. */
  cyclic: string[];
  /** Prefixes left unordered only because an ancestor lies on a cycle. Sorted. */
  blocked: string[];
}

/** A parent reference to a prefix no document declares. */
export interface MissingParent {
  prefix: string;
  parent: string;
}
