export type IssueLevel = "error" | "warning" | "info";

export type IssueCode =
  | "document-cycle"
  | "unknown-parent-document"
  | "config-error"
  | "item-parse-error"
  | "item-format"
  | "item-cycle"
  | "link-conformance"
  | "self-link"
  | "missing-link-target"
  | "inactive-link-target"
  | "non-normative-link-target"
  | "non-normative-links"
  | "suspect-link"
  | "unverified-link"
  | "never-reviewed"
  | "modified-since-review"
  | "empty-text"
  | "no-children"
  | "unlinked-item"
  | "empty-document";

/** A single finding. Pure data: producing issues never touches the graph. */
export interface ValidationIssue {
  level: IssueLevel;
  code: IssueCode;
  /** Item uid, document prefix, or file path the issue is about. */
  subject: string;
  message: string;
  /** Structured detail. Keys vary by code. */
  context: Record<string, unknown>;
}
