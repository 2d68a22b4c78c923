export { createDocument, deleteDocument, listDocuments } from "./documents.js";
export type {
  CreateDocumentInput,
  DeleteDocumentOptions,
  DeleteDocumentResult,
  DocumentSummary,
} from "./documents.js";
export { addItem, editItem, listItems, removeItem, showItem } from "./items.js";
export type { EditItemOptions, ItemPatch, NewItemInput, RemoveItemResult } from "./items.js";
export { linkItems, unlinkItems } from "./links.js";
export type { LinkOptions } from "./links.js";
export { clearSuspectLinks, markReviewed, resetReview } from "./review.js";
export { ALL_ITEMS, openWorkspace } from "./workspace.js";
export type { Workspace } from "./workspace.js";
