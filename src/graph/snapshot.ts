import { z } from "zod";
import { DocumentDag } from "../documents/dag.js";
import { ConfigError } from "../errors.js";
import { itemTypeEnum } from "../items/schemas.js";
import type { Item } from "../items/types.js";
import { formatZodIssues } from "../utils/zod.js";
import { TraceabilityGraph } from "./traceability-graph.js";
import { SNAPSHOT_VERSION, type GraphSnapshot, type ItemRecord } from "./types.js";

const linkRecordSchema = z.union([
  z.string().transform((uid) => ({ uid, hash: null })),
  z.object({ uid: z.string().min(1), hash: z.string().nullable().default(null) }),
]);

export const itemRecordSchema = z.object({
  uid: z.string().min(1),
  documentPrefix: z.string().min(1),
  text: z.string().default(""),
  header: z.string().nullable().default(null),
  type: itemTypeEnum.default("requirement"),
  active: z.boolean().default(true),
  derived: z.boolean().default(false),
  testable: z.boolean().default(true),
  links: z.array(linkRecordSchema).default([]),
  reviewed: z.string().nullable().default(null),
  customAttributes: z.record(z.unknown()).default({}),
});

const snapshotSchema = z.object({
  version: z.number().int(),
  items: z.array(z.unknown()).default([]),
  documentParents: z.record(z.array(z.string())).default({}),
});

/** Bigints (integers too large for a number) become decimal strings. */
function toJsonValue(value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, toJsonValue(entry)]));
  }
  return value;
}

export function itemToRecord(item: Item): ItemRecord {
  return {
    uid: item.uid,
    documentPrefix: item.documentPrefix,
    text: item.text,
    header: item.header,
    type: item.type,
    active: item.active,
    derived: item.derived,
    testable: item.testable,
    links: item.links.map((link) => ({ uid: link.parentUid, hash: link.storedHash })),
    reviewed: item.reviewed,
    customAttributes: Object.fromEntries(
      Object.entries(item.customAttributes).map(([key, value]) => [key, toJsonValue(value)]),
    ),
  };
}

/** Validate a record and turn it back into an Item. Links may be bare uids. */
export function itemFromRecord(record: unknown): Item {
  const parsed = itemRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new ConfigError(`Invalid item record: ${formatZodIssues(parsed.error)}`);
  }
  const { links, header, ...rest } = parsed.data;
  return {
    ...rest,
    header: header ? header : null,
    links: links.map((link) => ({ parentUid: link.uid, storedHash: link.hash })),
  };
}

export function graphToSnapshot(graph: TraceabilityGraph): GraphSnapshot {
  const { itemParents, itemChildren } = graph.adjacency();
  return {
    version: SNAPSHOT_VERSION,
    items: graph.items.map(itemToRecord),
    itemParents,
    itemChildren,
    documentParents: graph.dag.toRecord(),
  };
}

/**
 * Rebuild a graph from a snapshot. Adjacency is recomputed from the item
 * links, so the stored `itemParents` / `itemChildren` are informational.
 */
export function graphFromSnapshot(snapshot: unknown): TraceabilityGraph {
  const parsed = snapshotSchema.safeParse(snapshot);
  if (!parsed.success) {
    throw new ConfigError(`Invalid graph snapshot: ${formatZodIssues(parsed.error)}`);
  }
  if (parsed.data.version !== SNAPSHOT_VERSION) {
    throw new ConfigError(`Unsupported snapshot version: ${parsed.data.version}`, {
      version: parsed.data.version,
    });
  }

  const dag = new DocumentDag(
    Object.entries(parsed.data.documentParents).map(([prefix, parents]) => ({ prefix, parents })),
  );
  const graph = new TraceabilityGraph(dag);
  for (const record of parsed.data.items) {
    graph.addItem(itemFromRecord(record));
  }
  return graph;
}
