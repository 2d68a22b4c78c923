import { readdir, rm, rmdir } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { documentConfigPath, saveDocumentConfig } from "../documents/config.js";
import { digitsSchema, prefixSchema, sepSchema } from "../documents/schemas.js";
import type { Document } from "../documents/types.js";
import { ConfigError, ConflictError, isErrnoCode, NotFoundError, toIOError } from "../errors.js";
import { deleteItemFile, listItemUids } from "../items/store.js";
import type { Item } from "../items/types.js";
import { formatZodIssues } from "../utils/zod.js";
import { getDocument, loadAllInDocument, openWorkspace, saveItem } from "./workspace.js";

export const createDocumentSchema = z.object({
  prefix: prefixSchema,
  /** Directory of the new document, relative to the project root. */
  path: z.string().min(1),
  parents: z.array(prefixSchema).default([]),
  digits: digitsSchema.default(3),
  sep: sepSchema.default(""),
});

export type CreateDocumentInput = z.input<typeof createDocumentSchema>;

export async function createDocument(root: string, input: CreateDocumentInput): Promise<Document> {
  const parsed = createDocumentSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid document: ${formatZodIssues(parsed.error)}`);
  }
  const { path: relativePath, ...settings } = parsed.data;
  const ws = await openWorkspace(root);

  const existing = ws.documents.get(settings.prefix);
  if (existing) {
    throw new ConflictError(`Document ${settings.prefix} already exists at ${existing.path}`, {
      prefix: settings.prefix,
    });
  }
  const path = resolve(ws.root, relativePath);
  for (const doc of ws.documents.values()) {
    if (doc.path === path) {
      throw new ConflictError(`Directory ${path} already holds document ${doc.prefix}`, { path });
    }
  }
  for (const parent of settings.parents) {
    if (!ws.documents.has(parent)) throw new NotFoundError("Document", parent);
  }

  const config = { ...settings, parents: [...new Set(settings.parents)] };
  await saveDocumentConfig(config, path);
  return { ...config, path };
}

export interface DeleteDocumentOptions {
  /** Delete even though other items link into the document. */
  force?: boolean;
  /** Remove links into the document from the referencing items first. */
  cascade?: boolean;
}

export interface DeleteDocumentResult {
  document: Document;
  /** Uids of the deleted item files. */
  removedItems: string[];
  /** Items whose links into the document were removed (cascade). */
  unlinkedItems: string[];
  /** `child -> parent` links left dangling (force). */
  danglingLinks: string[];
}

export async function deleteDocument(
  root: string,
  prefix: string,
  options: DeleteDocumentOptions = {},
): Promise<DeleteDocumentResult> {
  const ws = await openWorkspace(root);
  const doc = getDocument(ws, prefix);
  const ownUids = new Set(await listItemUids(doc));

  const referencing: Array<{ doc: Document; item: Item; targets: string[] }> = [];
  for (const other of ws.documents.values()) {
    if (other.prefix === prefix) continue;
    for (const item of await loadAllInDocument(other)) {
      const targets = item.links.map((link) => link.parentUid).filter((uid) => ownUids.has(uid));
      if (targets.length > 0) referencing.push({ doc: other, item, targets });
    }
  }

  const pairs = referencing.flatMap(({ item, targets }) => targets.map((target) => `${item.uid} -> ${target}`));
  if (pairs.length > 0 && !options.force && !options.cascade) {
    throw new ConflictError(`Document ${prefix} is still linked from other documents: ${pairs.join(", ")}`, {
      prefix,
      links: pairs,
    });
  }

  const unlinkedItems: string[] = [];
  if (options.cascade) {
    for (const { doc: owner, item, targets } of referencing) {
      const links = item.links.filter((link) => !targets.includes(link.parentUid));
      await saveItem(ws, owner, { ...item, links, reviewed: null });
      unlinkedItems.push(item.uid);
    }
  }

  const removedItems = [...ownUids];
  for (const uid of removedItems) await deleteItemFile(doc, uid);
  await removeDocumentDirectory(doc);

  return {
    document: doc,
    removedItems,
    unlinkedItems,
    danglingLinks: options.cascade ? [] : pairs,
  };
}

// Nested documents and foreign files keep the directory alive.
async function removeDocumentDirectory(doc: Document): Promise<void> {
  const configPath = documentConfigPath(doc.path);
  try {
    await rm(configPath, { force: true });
  } catch (err: unknown) {
    throw toIOError(err, "delete", configPath);
  }
  try {
    if ((await readdir(doc.path)).length === 0) await rmdir(doc.path);
  } catch (err: unknown) {
    if (!isErrnoCode(err, "ENOENT")) throw toIOError(err, "delete", doc.path);
  }
}

export interface DocumentSummary extends Document {
  itemCount: number;
}

/** Documents of the project sorted by prefix, with their item counts. */
export async function listDocuments(root: string): Promise<DocumentSummary[]> {
  const ws = await openWorkspace(root);
  const summaries: DocumentSummary[] = [];
  for (const doc of [...ws.documents.values()].sort((a, b) => (a.prefix < b.prefix ? -1 : 1))) {
    summaries.push({ ...doc, itemCount: (await listItemUids(doc)).length });
  }
  return summaries;
}
