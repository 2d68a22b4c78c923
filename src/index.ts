export * from "./errors.js";

// Documents
export { DocumentDag } from "./documents/dag.js";
export {
  DOCUMENT_CONFIG_FILE,
  formatDocumentConfig,
  loadDocumentConfig,
  parseDocumentConfig,
  saveDocumentConfig,
} from "./documents/config.js";
export { DEFAULT_IGNORED_DIRS, discoverDocuments, findConfigFiles, orderDocuments } from "./documents/discovery.js";
export type { DiscoveryOptions, DiscoveryResult } from "./documents/discovery.js";
export type { Document, DocumentConfig, DocumentNode, MissingParent, TopologicalResult } from "./documents/types.js";

// Items
export { formatItemFile, parseItemFile } from "./items/codec.js";
export { displayText } from "./items/display.js";
export { contentHash } from "./items/hash.js";
export { allocateUid, deleteItemFile, itemPath, listItemUids, loadDocumentItems, readItem, writeItem } from "./items/store.js";
export { formatUid, nextUid, uidSequence } from "./items/uid.js";
export { ITEM_TYPES } from "./items/types.js";
export type { HashableItem, Item, ItemType, Link, LinkEncoding, ParsedItem } from "./items/types.js";

// Graph
export * from "./graph/index.js";

// Validation
export { CHECKS, omitSkippedDocuments, validate } from "./validation/validator.js";
export { countIssues, escalate, escalateLevel, exitCodeFor, hasErrors } from "./validation/severity.js";
export type { IssueCounts, EscalationOptions } from "./validation/severity.js";
export type { IssueCode, IssueLevel, ValidationIssue } from "./validation/types.js";

// Configuration
export { loadConfig, PROJECT_CONFIG_FILE } from "./config/loader.js";
export { reqgraphConfigSchema, validationOptionsSchema } from "./config/schema.js";
export type { CheckName, ReqgraphConfig, ValidationOptions, ValidationOptionsInput } from "./config/schema.js";

// Operations
export * from "./operations/index.js";

// Reporting
export { formatHumanReport, formatIssue, formatSummary } from "./reporter/human.js";
export { buildJsonReport, formatJsonReport } from "./reporter/json.js";
export type { HumanReportOptions } from "./reporter/human.js";
export type { JsonReport } from "./reporter/json.js";
