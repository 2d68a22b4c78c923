import { parse as yamlParse, stringify as yamlStringify } from "yaml";
import { ItemParseError } from "../errors.js";
import { formatZodIssues } from "../utils/zod.js";
import { itemFileSchema, STANDARD_ITEM_KEYS, STORED_HASH_PATTERN } from "./schemas.js";
import type { Item, LinkEncoding, Link, ParsedItem } from "./types.js";

export interface ItemFileContext {
  /** Uid taken from the file name. */
  uid: string;
  documentPrefix: string;
}

export interface FormatItemOptions {
  /** `auto` writes `{uid: hash}` for verified links and bare uids otherwise. Default `auto`. */
  linkEncoding?: LinkEncoding;
}

const standardKeys = new Set<string>(STANDARD_ITEM_KEYS);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/** Integers the yaml parser read as bigint go back to numbers unless that would round them. */
function narrowIntegers(value: unknown): unknown {
  if (typeof value === "bigint") {
    return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value;
  }
  if (Array.isArray(value)) return value.map(narrowIntegers);
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, narrowIntegers(entry)]));
  }
  return value;
}

function describeValue(value: unknown): string {
  return JSON.stringify(value, (_key, entry: unknown) => (typeof entry === "bigint" ? entry.toString() : entry));
}

/**
 * Accepts both on-disk link encodings (`- SYS001` and `- SYS001: <hash>`) and
 * returns them as uniform Links, dropping and reporting anything else.
 */
function normalizeLinks(uid: string, rawLinks: unknown[], warnings: string[]): Link[] {
  const links: Link[] = [];
  const seen = new Set<string>();

  const add = (rawUid: string, storedHash: string | null): void => {
    const parentUid = rawUid.trim();
    if (!parentUid) {
      warnings.push(`empty link uid in ${uid}, skipping`);
      return;
    }
    if (seen.has(parentUid)) {
      warnings.push(`duplicate link to ${parentUid} in ${uid}, keeping the first`);
      return;
    }
    seen.add(parentUid);
    links.push({ parentUid, storedHash });
  };

  for (const entry of rawLinks) {
    if (typeof entry === "string") {
      add(entry, null);
    } else if (isRecord(entry)) {
      for (const [parentUid, hash] of Object.entries(entry)) {
        if (hash === null || hash === undefined || hash === "") {
          add(parentUid, null);
        } else if (typeof hash === "string" && STORED_HASH_PATTERN.test(hash)) {
          add(parentUid, hash);
        } else {
          warnings.push(`invalid hash format for link ${parentUid.trim()} in ${uid}, treating as unverified`);
          add(parentUid, null);
        }
      }
    } else {
      warnings.push(`link entry in ${uid} is not a uid: ${describeValue(entry)}, skipping`);
    }
  }

  return links;
}

function readLinks(uid: string, raw: unknown, warnings: string[]): Link[] {
  if (raw === undefined || raw === null) return [];
  if (Array.isArray(raw)) return normalizeLinks(uid, raw, warnings);
  warnings.push(`links in ${uid} is not a list: ${describeValue(raw)}, ignoring it`);
  return [];
}

function normalizeReviewed(uid: string, raw: unknown, warnings: string[]): string | null {
  if (raw === undefined || raw === null || raw === "") return null;
  if (typeof raw === "string") return raw;
  warnings.push(`non-string reviewed value in ${uid}: ${describeValue(raw)}, treating as not reviewed`);
  return null;
}

/**
 * Parse the text of an item file. Pure: the uid and document come from the
 * caller. Throws ItemParseError when the file cannot represent an item.
 */
export function parseItemFile(content: string, context: ItemFileContext): ParsedItem {
  const { uid, documentPrefix } = context;
  if (!uid.trim()) {
    throw new ItemParseError("Item file has an empty uid", uid);
  }

  let data: unknown;
  try {
    data = narrowIntegers(yamlParse(content, { intAsBigInt: true }));
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ItemParseError(`Invalid YAML in item ${uid}: ${reason}`, uid);
  }

  // An empty file is an item with every field at its default.
  const raw = data === null || data === undefined ? {} : data;
  if (!isRecord(raw)) {
    throw new ItemParseError(`Item ${uid} must be a YAML mapping`, uid);
  }

  const parsed = itemFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ItemParseError(`Invalid item ${uid}: ${formatZodIssues(parsed.error)}`, uid);
  }

  const warnings: string[] = [];
  const fields = parsed.data;
  const customAttributes = Object.fromEntries(Object.entries(raw).filter(([key]) => !standardKeys.has(key)));

  const item: Item = {
    uid,
    documentPrefix,
    text: fields.text,
    header: fields.header ? fields.header : null,
    type: fields.type,
    active: fields.active,
    derived: fields.derived,
    testable: fields.testable,
    links: readLinks(uid, fields.links, warnings),
    reviewed: normalizeReviewed(uid, fields.reviewed, warnings),
    customAttributes,
  };

  return { item, warnings };
}

/**
 * Serialize an item to the on-disk YAML layout. Custom attributes follow the
 * standard keys in their original order. Standard keys win over a custom
 * attribute of the same name.
 */
export function formatItemFile(item: Item, options: FormatItemOptions = {}): string {
  const encoding = options.linkEncoding ?? "auto";
  const entries: Array<[string, unknown]> = [];

  if (item.header) entries.push(["header", item.header]);
  entries.push(["active", item.active], ["type", item.type]);
  entries.push([
    "links",
    item.links.map((link) =>
      encoding === "auto" && link.storedHash !== null ? { [link.parentUid]: link.storedHash } : link.parentUid,
    ),
  ]);
  entries.push(["text", item.text], ["reviewed", item.reviewed]);
  if (item.derived) entries.push(["derived", true]);
  if (!item.testable) entries.push(["testable", false]);

  for (const entry of Object.entries(item.customAttributes)) {
    if (!standardKeys.has(entry[0])) entries.push(entry);
  }

  return yamlStringify(Object.fromEntries(entries), { blockQuote: "literal", lineWidth: 0 });
}
