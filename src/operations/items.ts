import { z } from "zod";
import { ConfigError, ConflictError } from "../errors.js";
import { contentHash } from "../items/hash.js";
import { itemTypeEnum } from "../items/schemas.js";
import { allocateUid, deleteItemFile } from "../items/store.js";
import type { Item, Link } from "../items/types.js";
import { formatZodIssues } from "../utils/zod.js";
import {
  contentChanged,
  getDocument,
  loadAllInDocument,
  loadItem,
  openWorkspace,
  saveItem,
  type Workspace,
} from "./workspace.js";

const itemFieldsSchema = z.object({
  text: z.string(),
  header: z.string().nullable(),
  type: itemTypeEnum,
  active: z.boolean(),
  derived: z.boolean(),
  testable: z.boolean(),
  links: z.array(z.string().min(1)),
  customAttributes: z.record(z.unknown()),
});

/** Fields accepted when creating or patching an item. All optional. */
export const itemInputSchema = itemFieldsSchema.partial();

export type NewItemInput = z.input<typeof itemInputSchema>;
export type ItemPatch = z.input<typeof itemInputSchema>;

function parseInput(input: unknown, label: string): z.output<typeof itemInputSchema> {
  const parsed = itemInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${label}: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Resolve link targets to canonical uids, checking each one exists. */
async function resolveLinks(ws: Workspace, uids: readonly string[], childUid: string | null): Promise<string[]> {
  const resolved: string[] = [];
  for (const raw of uids) {
    const { item } = await loadItem(ws, raw);
    if (item.uid === childUid) {
      throw new ConflictError(`Item ${item.uid} cannot link to itself`, { uid: item.uid });
    }
    if (!resolved.includes(item.uid)) resolved.push(item.uid);
  }
  return resolved;
}

/** Create an item with the next free uid. New links are unverified and the item is unreviewed. */
export async function addItem(root: string, prefix: string, input: NewItemInput = {}): Promise<Item> {
  const fields = parseInput(input, "item");
  const ws = await openWorkspace(root);
  const doc = getDocument(ws, prefix);
  const parentUids = await resolveLinks(ws, fields.links ?? [], null);

  const item: Item = {
    uid: await allocateUid(doc),
    documentPrefix: doc.prefix,
    text: fields.text ?? "",
    header: fields.header ? fields.header : null,
    type: fields.type ?? "requirement",
    active: fields.active ?? true,
    derived: fields.derived ?? false,
    testable: fields.testable ?? true,
    links: parentUids.map((parentUid) => ({ parentUid, storedHash: null })),
    reviewed: null,
    customAttributes: fields.customAttributes ?? {},
  };
  await saveItem(ws, doc, item);
  return item;
}

export interface EditItemOptions {
  /** Record the item as reviewed at its new content. */
  markReviewed?: boolean;
}

/**
 * Apply a patch to an item. A change to text, header, links or type clears
 * `reviewed`. A links patch replaces the list; links kept from before keep
 * their stored hash.
 */
export async function editItem(
  root: string,
  uid: string,
  patch: ItemPatch,
  options: EditItemOptions = {},
): Promise<Item> {
  const fields = parseInput(patch, "item patch");
  const ws = await openWorkspace(root);
  const { doc, item } = await loadItem(ws, uid);

  let links: Link[] = item.links;
  if (fields.links) {
    const previous = new Map(item.links.map((link) => [link.parentUid, link.storedHash]));
    links = (await resolveLinks(ws, fields.links, item.uid)).map((parentUid) => ({
      parentUid,
      storedHash: previous.get(parentUid) ?? null,
    }));
  }

  const updated: Item = {
    ...item,
    text: fields.text ?? item.text,
    header: fields.header === undefined ? item.header : fields.header || null,
    type: fields.type ?? item.type,
    active: fields.active ?? item.active,
    derived: fields.derived ?? item.derived,
    testable: fields.testable ?? item.testable,
    customAttributes: fields.customAttributes ?? item.customAttributes,
    links,
  };
  if (options.markReviewed) {
    updated.reviewed = contentHash(updated);
  } else if (contentChanged(item, updated)) {
    updated.reviewed = null;
  }

  await saveItem(ws, doc, updated);
  return updated;
}

export interface RemoveItemResult {
  item: Item;
  /** Uids of items that still link to the removed item. */
  linkedFrom: string[];
}

export async function removeItem(root: string, uid: string): Promise<RemoveItemResult> {
  const ws = await openWorkspace(root);
  const { doc, item } = await loadItem(ws, uid);

  const linkedFrom: string[] = [];
  for (const other of ws.documents.values()) {
    for (const candidate of await loadAllInDocument(other)) {
      if (candidate.links.some((link) => link.parentUid === item.uid)) linkedFrom.push(candidate.uid);
    }
  }

  await deleteItemFile(doc, item.uid);
  return { item, linkedFrom: linkedFrom.sort() };
}

export async function showItem(root: string, uid: string): Promise<Item> {
  const ws = await openWorkspace(root);
  return (await loadItem(ws, uid)).item;
}

/** Items of one document, or of every document, sorted by uid. */
export async function listItems(root: string, prefix?: string): Promise<Item[]> {
  const ws = await openWorkspace(root);
  const docs = prefix === undefined ? [...ws.documents.values()] : [getDocument(ws, prefix)];
  const items: Item[] = [];
  for (const doc of docs) items.push(...(await loadAllInDocument(doc)));
  return items.sort((a, b) => (a.uid < b.uid ? -1 : a.uid > b.uid ? 1 : 0));
}

