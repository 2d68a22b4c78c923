import { z } from "zod";

export const issueLevelEnum = z.enum(["error", "warning", "info"]);

/** One toggle per check. Document-DAG acyclicity always runs and has none. */
export const checkTogglesSchema = z.object({
  itemCycles: z.boolean().default(true),
  linkConformance: z.boolean().default(true),
  linkValidity: z.boolean().default(true),
  suspectLinks: z.boolean().default(true),
  reviewStatus: z.boolean().default(true),
  emptyText: z.boolean().default(true),
  childLinkage: z.boolean().default(true),
  unlinkedItems: z.boolean().default(true),
  emptyDocuments: z.boolean().default(true),
});

export const completenessSeveritySchema = z.object({
  childLinkage: issueLevelEnum.default("info"),
  unlinkedItems: issueLevelEnum.default("warning"),
});

export const validationOptionsSchema = z.object({
  checks: checkTogglesSchema.default({}),
  severity: completenessSeveritySchema.default({}),
  /** Document prefixes whose items and documents produce no issues. */
  skip: z.array(z.string()).default([]),
  /** Promote info to warning. */
  warnAll: z.boolean().default(false),
  /** Promote warning to error. */
  errorAll: z.boolean().default(false),
});

export const reqgraphConfigSchema = z.object({
  validation: validationOptionsSchema.default({}),
  links: z
    .object({
      encoding: z.enum(["auto", "plain"]).default("auto"),
    })
    .default({}),
  /** Directory names skipped during document discovery. */
  ignore: z.array(z.string()).default(["node_modules", ".git"]),
});

export type ReqgraphConfigInput = z.input<typeof reqgraphConfigSchema>;
export type ReqgraphConfig = z.output<typeof reqgraphConfigSchema>;
export type ValidationOptionsInput = z.input<typeof validationOptionsSchema>;
export type ValidationOptions = z.output<typeof validationOptionsSchema>;
export type CheckName = keyof z.output<typeof checkTogglesSchema>;
