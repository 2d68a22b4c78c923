import { NotFoundError } from "../errors.js";
import { contentHash } from "../items/hash.js";
import type { Item, Link } from "../items/types.js";
import { loadItem, openWorkspace, saveItem, selectItems, type Workspace } from "./workspace.js";

/**
 * Mark every item selected by `label` (uid, document prefix or `all`) as
 * reviewed at its current content. Returns the updated items.
 */
export async function markReviewed(root: string, label: string): Promise<Item[]> {
  const ws = await openWorkspace(root);
  const updated: Item[] = [];
  for (const { doc, item } of await selectItems(ws, label)) {
    const reviewed = contentHash(item);
    if (item.reviewed === reviewed) continue;
    const next = { ...item, reviewed };
    await saveItem(ws, doc, next);
    updated.push(next);
  }
  return updated;
}

/**
 * Re-verify links of the selected items: each link whose parent exists gets
 * the parent's current hash. With `parents`, only links to those uids.
 * Returns the items that changed.
 */
export async function clearSuspectLinks(root: string, label: string, parents?: readonly string[]): Promise<Item[]> {
  const ws = await openWorkspace(root);
  const only = parents ? new Set(parents.map((uid) => uid.toUpperCase())) : null;
  const parentHashes = new Map<string, string | null>();
  const updated: Item[] = [];

  for (const { doc, item } of await selectItems(ws, label)) {
    let changed = false;
    const links: Link[] = [];
    for (const link of item.links) {
      if (only && !only.has(link.parentUid.toUpperCase())) {
        links.push(link);
        continue;
      }
      const hash = await parentHash(ws, link.parentUid, parentHashes);
      if (hash === null || hash === link.storedHash) {
        links.push(link);
        continue;
      }
      links.push({ ...link, storedHash: hash });
      changed = true;
    }
    if (!changed) continue;
    const next = { ...item, links };
    await saveItem(ws, doc, next);
    updated.push(next);
  }
  return updated;
}

/** Clear `reviewed` and every stored link hash of the selected items. */
export async function resetReview(root: string, label: string): Promise<Item[]> {
  const ws = await openWorkspace(root);
  const updated: Item[] = [];
  for (const { doc, item } of await selectItems(ws, label)) {
    const next: Item = {
      ...item,
      reviewed: null,
      links: item.links.map((link) => ({ ...link, storedHash: null })),
    };
    await saveItem(ws, doc, next);
    updated.push(next);
  }
  return updated;
}

// null when the parent no longer exists.
async function parentHash(ws: Workspace, uid: string, cache: Map<string, string | null>): Promise<string | null> {
  const cached = cache.get(uid);
  if (cached !== undefined) return cached;
  let hash: string | null;
  try {
    hash = contentHash((await loadItem(ws, uid)).item);
  } catch (err: unknown) {
    if (!(err instanceof NotFoundError)) throw err;
    hash = null;
  }
  cache.set(uid, hash);
  return hash;
}
