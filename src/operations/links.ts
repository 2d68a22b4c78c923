import { ConflictError, NotFoundError } from "../errors.js";
import { contentHash } from "../items/hash.js";
import type { Item } from "../items/types.js";
import { loadItem, openWorkspace, saveItem } from "./workspace.js";

export interface LinkOptions {
  /** Store the parent's current content hash on the new link. */
  verify?: boolean;
}

/** Add a child → parent link. The child's review is cleared. */
export async function linkItems(
  root: string,
  childUid: string,
  parentUid: string,
  options: LinkOptions = {},
): Promise<Item> {
  const ws = await openWorkspace(root);
  const { doc, item: child } = await loadItem(ws, childUid);
  const { item: parent } = await loadItem(ws, parentUid);

  if (parent.uid === child.uid) {
    throw new ConflictError(`Item ${child.uid} cannot link to itself`, { uid: child.uid });
  }
  if (child.links.some((link) => link.parentUid === parent.uid)) {
    throw new ConflictError(`Item ${child.uid} already links to ${parent.uid}`, {
      child: child.uid,
      parent: parent.uid,
    });
  }

  const updated: Item = {
    ...child,
    links: [...child.links, { parentUid: parent.uid, storedHash: options.verify ? contentHash(parent) : null }],
    reviewed: null,
  };
  await saveItem(ws, doc, updated);
  return updated;
}

/** Remove a child → parent link. The parent need not exist any more. */
export async function unlinkItems(root: string, childUid: string, parentUid: string): Promise<Item> {
  const ws = await openWorkspace(root);
  const { doc, item: child } = await loadItem(ws, childUid);
  const target = parentUid.trim().toUpperCase();

  const links = child.links.filter((link) => link.parentUid.toUpperCase() !== target);
  if (links.length === child.links.length) {
    throw new NotFoundError("Link", `${child.uid} -> ${parentUid}`);
  }

  const updated: Item = { ...child, links, reviewed: null };
  await saveItem(ws, doc, updated);
  return updated;
}
