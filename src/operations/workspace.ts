import { loadConfig } from "../config/loader.js";
import type { ReqgraphConfig } from "../config/schema.js";
import { discoverDocuments } from "../documents/discovery.js";
import type { Document } from "../documents/types.js";
import { NotFoundError } from "../errors.js";
import { contentHash } from "../items/hash.js";
import { loadDocumentItems, readItem, writeItem } from "../items/store.js";
import type { Item } from "../items/types.js";
import { uidPattern } from "../items/uid.js";

/** A discovered project plus its configuration, as every operation sees it. */
export interface Workspace {
  root: string;
  config: ReqgraphConfig;
  documents: Map<string, Document>;
}

/** Label selecting every item of the project. */
export const ALL_ITEMS = "all";

export async function openWorkspace(root: string): Promise<Workspace> {
  const config = await loadConfig(root);
  const discovery = await discoverDocuments(root, { ignore: config.ignore });
  return { root: discovery.root, config, documents: discovery.documents };
}

export function getDocument(ws: Workspace, prefix: string): Document {
  const doc = ws.documents.get(prefix);
  if (!doc) throw new NotFoundError("Document", prefix);
  return doc;
}

/**
 * Document an item uid belongs to, with the uid's prefix and separator
 * rewritten in the document's own casing.
 */
export function locateItem(ws: Workspace, uid: string): { doc: Document; uid: string } {
  for (const doc of ws.documents.values()) {
    const match = uidPattern(doc.prefix, doc.sep).exec(uid);
    if (match) return { doc, uid: `${doc.prefix}${doc.sep}${match[1]}` };
  }
  throw new NotFoundError("Item", uid);
}

/** Read one item by uid. Throws NotFoundError when no file exists. */
export async function loadItem(ws: Workspace, uid: string): Promise<{ doc: Document; item: Item }> {
  const located = locateItem(ws, uid);
  const { item } = await readItem(located.doc, located.uid);
  return { doc: located.doc, item };
}

export async function saveItem(ws: Workspace, doc: Document, item: Item): Promise<string> {
  return writeItem(doc, item, { linkEncoding: ws.config.links.encoding });
}

/**
 * Every item of one document. Unlike graph building, an unparseable file
 * aborts the operation: it cannot be rewritten safely.
 */
export async function loadAllInDocument(doc: Document): Promise<Item[]> {
  const loaded = await loadDocumentItems(doc);
  const [failure] = loaded.failures;
  if (failure) throw failure.error;
  return loaded.items.map((parsed) => parsed.item);
}

export interface SelectedItem {
  doc: Document;
  item: Item;
}

/** Resolve a label: `all`, a document prefix, or a single uid. */
export async function selectItems(ws: Workspace, label: string): Promise<SelectedItem[]> {
  const docs =
    label === ALL_ITEMS ? [...ws.documents.values()] : ws.documents.has(label) ? [getDocument(ws, label)] : null;

  if (!docs) return [await loadItem(ws, label)];

  const selected: SelectedItem[] = [];
  for (const doc of docs) {
    for (const item of await loadAllInDocument(doc)) selected.push({ doc, item });
  }
  return selected;
}

/** True when a change to these fields alters the item's content hash. */
export function contentChanged(before: Item, after: Item): boolean {
  return contentHash(before) !== contentHash(after);
}
