import { contentHash } from "../items/hash.js";
import { issue, subjectItems, type CheckContext } from "./context.js";
import type { ValidationIssue } from "./types.js";

/**
 * Per-link validity: self-links, missing and inactive targets, requirements
 * tracing to non-requirements, and links on headings or info items.
 */
export function checkLinkValidity(ctx: CheckContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const item of subjectItems(ctx)) {
    if (item.type !== "requirement" && item.links.length > 0) {
      issues.push(
        issue(
          "error",
          "non-normative-links",
          item.uid,
          `${item.type} items cannot have links (has ${item.links.length})`,
          { type: item.type, links: item.links.map((link) => link.parentUid) },
        ),
      );
    }

    for (const link of item.links) {
      const parentUid = link.parentUid;
      if (parentUid === item.uid) {
        issues.push(issue("error", "self-link", item.uid, "links to itself", { parentUid }));
        continue;
      }

      const target = ctx.graph.getItem(parentUid);
      if (!target) {
        issues.push(
          issue("error", "missing-link-target", item.uid, `links to non-existent item: ${parentUid}`, { parentUid }),
        );
        continue;
      }

      if (!target.active) {
        issues.push(
          issue("warning", "inactive-link-target", item.uid, `links to inactive item: ${parentUid}`, { parentUid }),
        );
      }

      if (item.type === "requirement" && target.type !== "requirement") {
        issues.push(
          issue(
            "warning",
            "non-normative-link-target",
            item.uid,
            `links to ${parentUid}, which is not a requirement (type: ${target.type})`,
            { parentUid, targetType: target.type },
          ),
        );
      }
    }
  }

  return issues;
}

/**
 * Compare each stored link hash with the parent's current content hash. A link
 * without a stored hash is reported separately as unverified.
 */
export function checkSuspectLinks(ctx: CheckContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const hashes = new Map<string, string>();

  for (const item of subjectItems(ctx)) {
    for (const link of item.links) {
      const target = ctx.graph.getItem(link.parentUid);
      if (!target || target.uid === item.uid) continue;

      if (link.storedHash === null) {
        issues.push(
          issue("warning", "unverified-link", item.uid, `link to ${target.uid} has never been verified`, {
            parentUid: target.uid,
          }),
        );
        continue;
      }

      let current = hashes.get(target.uid);
      if (current === undefined) {
        current = contentHash(target);
        hashes.set(target.uid, current);
      }
      if (current !== link.storedHash) {
        issues.push(
          issue(
            "warning",
            "suspect-link",
            item.uid,
            `suspect link to ${target.uid} (parent content changed since the link was verified)`,
            { parentUid: target.uid, storedHash: link.storedHash, currentHash: current },
          ),
        );
      }
    }
  }

  return issues;
}

/** Active requirements must be reviewed, and unchanged since. */
export function checkReviewStatus(ctx: CheckContext): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const item of subjectItems(ctx)) {
    if (item.type !== "requirement") continue;
    if (!item.reviewed) {
      issues.push(issue("warning", "never-reviewed", item.uid, "has not been reviewed"));
      continue;
    }
    const current = contentHash(item);
    if (item.reviewed !== current) {
      issues.push(
        issue("warning", "modified-since-review", item.uid, "has been modified since it was reviewed", {
          reviewed: item.reviewed,
          currentHash: current,
        }),
      );
    }
  }

  return issues;
}

export function checkEmptyText(ctx: CheckContext): ValidationIssue[] {
  return subjectItems(ctx)
    .filter((item) => item.text.trim() === "")
    .map((item) => issue("warning", "empty-text", item.uid, "has no text"));
}
