export { TraceabilityGraph } from "./traceability-graph.js";
export { buildGraph } from "./builder.js";
export type { BuildResult } from "./builder.js";
export { graphFromSnapshot, graphToSnapshot, itemFromRecord, itemRecordSchema, itemToRecord } from "./snapshot.js";
export { SNAPSHOT_VERSION } from "./types.js";
export type { GraphSnapshot, ItemRecord } from "./types.js";
