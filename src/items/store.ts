import { readdir, rm } from "node:fs/promises";
import { join } from "node:path";
import type { Document } from "../documents/types.js";
import { ItemParseError, isErrnoCode, NotFoundError, toIOError } from "../errors.js";
import { atomicWrite, readTextFile } from "../utils/fs.js";
import { formatItemFile, parseItemFile, type FormatItemOptions } from "./codec.js";
import type { Item, ParsedItem } from "./types.js";
import { itemFilePattern, nextUid } from "./uid.js";

export function itemPath(doc: Pick<Document, "path">, uid: string): string {
  return join(doc.path, `${uid}.yml`);
}

/** Uids of every item file in the document directory, sorted. */
export async function listItemUids(doc: Document): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(doc.path);
  } catch (err: unknown) {
    if (isErrnoCode(err, "ENOENT")) return [];
    throw toIOError(err, "list", doc.path);
  }
  const pattern = itemFilePattern(doc.prefix, doc.sep);
  return entries
    .filter((name) => pattern.test(name))
    .map((name) => name.slice(0, -".yml".length))
    .sort();
}

export async function readItem(doc: Document, uid: string): Promise<ParsedItem> {
  let raw: string;
  try {
    raw = await readTextFile(itemPath(doc, uid));
  } catch (err: unknown) {
    if (err instanceof Error && isErrnoCode(err.cause, "ENOENT")) {
      throw new NotFoundError("Item", uid);
    }
    throw err;
  }
  return parseItemFile(raw, { uid, documentPrefix: doc.prefix });
}

export interface ItemLoadFailure {
  uid: string;
  path: string;
  error: ItemParseError;
}

export interface LoadedDocument {
  /** Successfully parsed items, sorted by uid. */
  items: ParsedItem[];
  /** Item files that could not be parsed. */
  failures: ItemLoadFailure[];
}

/**
 * Load every item file of a document. A malformed file is recorded in
 * `failures` and the rest still load; filesystem errors propagate.
 */
export async function loadDocumentItems(doc: Document): Promise<LoadedDocument> {
  const items: ParsedItem[] = [];
  const failures: ItemLoadFailure[] = [];

  for (const uid of await listItemUids(doc)) {
    const path = itemPath(doc, uid);
    const raw = await readTextFile(path);
    try {
      items.push(parseItemFile(raw, { uid, documentPrefix: doc.prefix }));
    } catch (err: unknown) {
      if (!(err instanceof ItemParseError)) throw err;
      failures.push({ uid, path, error: err });
    }
  }

  return { items, failures };
}

/** Atomically write an item to `<document>/<uid>.yml`. */
export async function writeItem(doc: Document, item: Item, options: FormatItemOptions = {}): Promise<string> {
  const target = itemPath(doc, item.uid);
  await atomicWrite(target, formatItemFile(item, options));
  return target;
}

export async function deleteItemFile(doc: Document, uid: string): Promise<void> {
  const target = itemPath(doc, uid);
  try {
    await rm(target);
  } catch (err: unknown) {
    if (isErrnoCode(err, "ENOENT")) throw new NotFoundError("Item", uid);
    throw toIOError(err, "delete", target);
  }
}

/** Next free uid of a document, from the item files currently on disk. */
export async function allocateUid(doc: Document): Promise<string> {
  return nextUid(doc, await listItemUids(doc));
}
