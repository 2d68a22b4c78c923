import { z } from "zod";

export const itemTypeEnum = z.enum(["requirement", "heading", "info"]);

/** A stored link hash: unpadded URL-safe base64, at least 20 characters. */
export const STORED_HASH_PATTERN = /^[A-Za-z0-9_-]{20,}$/;

const scalarText = z
  .union([z.string(), z.number(), z.boolean()])
  .nullable()
  .transform((value) => (value === null ? "" : String(value)));

/**
 * Validates the standard keys of an item file. Links are checked entry by
 * entry by the codec so an odd value does not fail the item.
 */
export const itemFileSchema = z
  .object({
    active: z.boolean().default(true),
    type: itemTypeEnum.default("requirement"),
    text: scalarText.default(""),
    header: scalarText.optional(),
    links: z.unknown().optional(),
    reviewed: z.unknown().optional(),
    derived: z.boolean().default(false),
    testable: z.boolean().default(true),
  })
  .passthrough();

export const STANDARD_ITEM_KEYS = [
  "active",
  "type",
  "text",
  "header",
  "links",
  "reviewed",
  "derived",
  "testable",
] as const;
