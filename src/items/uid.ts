import type { DocumentConfig } from "../documents/types.js";

type UidFormat = Pick<DocumentConfig, "prefix" | "sep" | "digits">;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Matches `<prefix><sep><number>`, case-insensitively, capturing the number. */
export function uidPattern(prefix: string, sep: string): RegExp {
  return new RegExp(`^${escapeRegExp(prefix)}${escapeRegExp(sep)}(\\d+)$`, "i");
}

/** Matches item file names belonging to a document. */
export function itemFilePattern(prefix: string, sep: string): RegExp {
  return new RegExp(`^${escapeRegExp(prefix)}${escapeRegExp(sep)}\\d+\\.yml$`, "i");
}

export function formatUid(doc: UidFormat, sequence: number): string {
  if (!Number.isInteger(doc.digits) || doc.digits < 1) {
    throw new RangeError(`digits must be >= 1, got ${doc.digits}`);
  }
  return `${doc.prefix}${doc.sep}${String(sequence).padStart(doc.digits, "0")}`;
}

/** Sequence number of a uid in the given document, or null if it does not belong to it. */
export function uidSequence(uid: string, doc: Pick<DocumentConfig, "prefix" | "sep">): number | null {
  const match = uidPattern(doc.prefix, doc.sep).exec(uid);
  return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * Next uid for a document: highest existing sequence number plus one. Gaps
 * left by removed items are never filled.
 */
export function nextUid(doc: UidFormat, existingUids: Iterable<string>): string {
  let max = 0;
  for (const uid of existingUids) {
    const sequence = uidSequence(uid, doc);
    if (sequence !== null && sequence > max) max = sequence;
  }
  return formatUid(doc, max + 1);
}
