import type { ZodError } from "zod";

/** One-line summary of a zod failure: `path: message; path: message`. */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
