import { z } from "zod";

export const PREFIX_PATTERN = /^[A-Z][A-Z0-9_]+$/;

export const prefixSchema = z
  .string()
  .regex(
    PREFIX_PATTERN,
    "prefix must be at least 2 characters: an uppercase letter followed by uppercase letters, digits or underscores",
  );

export const digitsSchema = z.number().int().min(1).max(10);

export const sepSchema = z
  .string()
  .refine((sep) => !/^[A-Za-z0-9]/.test(sep), {
    message: "separator cannot start with a letter or digit (uids would be ambiguous)",
  });

/** `parents` may be written as a single prefix, a list, or left out. */
const parentsSchema = z.preprocess(
  (raw) => {
    if (raw === undefined || raw === null) return [];
    return Array.isArray(raw) ? raw : [raw];
  },
  z.array(z.string().min(1)),
);

/** Validates the `settings` block of a `.reqgraph.yml`. */
export const documentSettingsSchema = z.object({
  prefix: prefixSchema,
  parents: parentsSchema,
  digits: digitsSchema.default(3),
  sep: z.preprocess((raw) => (raw === null ? undefined : raw), sepSchema.default("")),
});

/** Validates a whole `.reqgraph.yml` file. */
export const documentConfigFileSchema = z.object({
  settings: documentSettingsSchema,
});
