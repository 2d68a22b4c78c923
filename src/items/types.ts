/** Item kinds. Only `requirement` items are normative. */
export type ItemType = "requirement" | "heading" | "info";

export const ITEM_TYPES: readonly ItemType[] = ["requirement", "heading", "info"];

/** Directed child → parent reference. */
export interface Link {
  parentUid: string;
  /** Parent content hash recorded when the link was verified. `null` = never verified. */
  storedHash: string | null;
}

/** A traceable record loaded from `<uid>.yml`. */
export interface Item {
  uid: string;
  documentPrefix: string;
  text: string;
  header: string | null;
  type: ItemType;
  active: boolean;
  /** Exempt from the "must link to a parent document" check. */
  derived: boolean;
  /** Only read by coverage rendering. */
  testable: boolean;
  /** Ordered, duplicate-free parent links. */
  links: Link[];
  /** Own content hash at last review. */
  reviewed: string | null;
  /** Unknown keys from the item file, kept verbatim. */
  customAttributes: Record<string, unknown>;
}

/** The fields that participate in the content hash. */
export type HashableItem = Pick<Item, "text" | "header" | "type"> & {
  links: ReadonlyArray<Pick<Link, "parentUid">>;
};

/** How links are written back to disk. */
export type LinkEncoding = "auto" | "plain";

/** Result of parsing an item file: the item plus any recoverable oddities. */
export interface ParsedItem {
  item: Item;
  warnings: string[];
}
