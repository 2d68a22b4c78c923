import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { ConfigError, DiscoveryError, IOError, isErrnoCode, toIOError } from "../errors.js";
import { DOCUMENT_CONFIG_FILE, loadDocumentConfig } from "./config.js";
import { DocumentDag } from "./dag.js";
import type { Document, DocumentConfig } from "./types.js";

export const DEFAULT_IGNORED_DIRS = ["node_modules", ".git"];

export interface DiscoveryOptions {
  /** Directory names never descended into. */
  ignore?: string[];
}

export interface DiscoveryResult {
  /** Absolute project root that was searched. */
  root: string;
  /** Documents keyed by prefix, in config-path order. */
  documents: Map<string, Document>;
  dag: DocumentDag;
  /** Config files that could not be loaded. Their documents are left out. */
  configErrors: ConfigError[];
}

/** Recursively find every `.reqgraph.yml` under root, sorted by path. */
export async function findConfigFiles(root: string, ignore: string[] = DEFAULT_IGNORED_DIRS): Promise<string[]> {
  const skip = new Set(ignore);
  const found: string[] = [];
  const pending = [root];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err: unknown) {
      throw toIOError(err, "list", dir);
    }
    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (!skip.has(entry.name)) pending.push(join(dir, entry.name));
      } else if (entry.isFile() && entry.name === DOCUMENT_CONFIG_FILE) {
        found.push(join(dir, entry.name));
      }
    }
  }

  return found.sort();
}

/**
 * Locate and load every document under root.
 *
 * A malformed config only drops its own document (see `configErrors`). Two
 * documents sharing a prefix abort discovery with a DiscoveryError, since uid
 * generation depends on prefixes being unique.
 */
export async function discoverDocuments(
  rootPath: string,
  options: DiscoveryOptions = {},
): Promise<DiscoveryResult> {
  const root = resolve(rootPath);
  try {
    const info = await stat(root);
    if (!info.isDirectory()) {
      throw new IOError(`Root is not a directory: ${root}`, root);
    }
  } catch (err: unknown) {
    if (isErrnoCode(err, "ENOENT")) {
      throw new IOError(`Root directory not found: ${root}`, root, { cause: err });
    }
    throw toIOError(err, "stat", root);
  }

  const documents = new Map<string, Document>();
  const configErrors: ConfigError[] = [];
  const seenAt = new Map<string, string[]>();

  for (const configPath of await findConfigFiles(root, options.ignore)) {
    let config: DocumentConfig;
    try {
      config = await loadDocumentConfig(configPath);
    } catch (err: unknown) {
      if (err instanceof ConfigError) {
        configErrors.push(err);
        continue;
      }
      throw err;
    }

    const path = dirname(configPath);
    const paths = seenAt.get(config.prefix) ?? [];
    paths.push(path);
    seenAt.set(config.prefix, paths);
    if (!documents.has(config.prefix)) {
      documents.set(config.prefix, { ...config, path });
    }
  }

  const duplicates = [...seenAt].filter(([, paths]) => paths.length > 1);
  if (duplicates.length > 0) {
    const detail = duplicates.map(([prefix, paths]) => `${prefix} (${paths.join(", ")})`).join("; ");
    throw new DiscoveryError(
      `Duplicate document prefix: ${detail}`,
      duplicates.map(([prefix]) => prefix).sort(),
      { paths: Object.fromEntries(duplicates) },
    );
  }

  return {
    root,
    documents,
    dag: new DocumentDag(documents.values()),
    configErrors,
  };
}

/**
 * Topological order of the discovered documents.
 * Throws DiscoveryError naming exactly the prefixes that lie on a cycle.
 */
export function orderDocuments(dag: DocumentDag): string[] {
  const { order, cyclic } = dag.topologicalSort();
  if (cyclic.length > 0) {
    throw new DiscoveryError(`Cycle detected among documents: ${cyclic.join(", ")}`, cyclic);
  }
  return order;
}
