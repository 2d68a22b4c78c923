import type { ItemType } from "../items/types.js";

/** JSON-compatible form of an Item. */
export interface ItemRecord {
  uid: string;
  documentPrefix: string;
  text: string;
  header: string | null;
  type: ItemType;
  active: boolean;
  derived: boolean;
  testable: boolean;
  links: Array<{ uid: string; hash: string | null }>;
  reviewed: string | null;
  customAttributes: Record<string, unknown>;
}

export const SNAPSHOT_VERSION = 1;

/** Serialized TraceabilityGraph. */
export interface GraphSnapshot {
  version: typeof SNAPSHOT_VERSION;
  items: ItemRecord[];
  itemParents: Record<string, string[]>;
  itemChildren: Record<string, string[]>;
  documentParents: Record<string, string[]>;
}
