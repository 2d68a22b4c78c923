import { createHash } from "node:crypto";
import type { HashableItem } from "./types.js";

/**
 * SHA-256 over `text | header | sorted parent uids | type`, encoded as
 * unpadded URL-safe base64.
 *
 * Stored link hashes are not part of the input: re-verifying a link must not
 * change the child's own hash. Strings are NFC-normalized so the same content
 * hashes identically on every platform.
 */
export function contentHash(item: HashableItem): string {
  const parentUids = item.links.map((link) => link.parentUid).sort();
  const input = [
    item.text.normalize("NFC"),
    (item.header ?? "").normalize("NFC"),
    JSON.stringify(parentUids),
    item.type,
  ].join("|");
  return createHash("sha256").update(input, "utf8").digest("base64url");
}
