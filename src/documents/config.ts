import { join } from "node:path";
import { parse as yamlParse, stringify as yamlStringify } from "yaml";
import { ConfigError } from "../errors.js";
import { atomicWrite, readTextFile } from "../utils/fs.js";
import { formatZodIssues } from "../utils/zod.js";
import { documentConfigFileSchema } from "./schemas.js";
import type { DocumentConfig } from "./types.js";

export const DOCUMENT_CONFIG_FILE = ".reqgraph.yml";

export function documentConfigPath(directory: string): string {
  return join(directory, DOCUMENT_CONFIG_FILE);
}

/** Parse the text of a `.reqgraph.yml`. `source` only labels error messages. */
export function parseDocumentConfig(content: string, source: string): DocumentConfig {
  let data: unknown;
  try {
    data = yamlParse(content);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid YAML in ${source}: ${reason}`, { path: source });
  }

  const parsed = documentConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`Invalid document config ${source}: ${formatZodIssues(parsed.error)}`, {
      path: source,
    });
  }
  return parsed.data.settings;
}

export async function loadDocumentConfig(path: string): Promise<DocumentConfig> {
  const raw = await readTextFile(path);
  return parseDocumentConfig(raw, path);
}

/** Serialize settings in a stable key order. `parents` is omitted for root documents. */
export function formatDocumentConfig(config: DocumentConfig): string {
  const settings: Record<string, unknown> = {
    prefix: config.prefix,
    digits: config.digits,
    sep: config.sep,
  };
  if (config.parents.length > 0) {
    settings.parents = config.parents;
  }
  return yamlStringify({ settings });
}

export async function saveDocumentConfig(config: DocumentConfig, directory: string): Promise<string> {
  const target = documentConfigPath(directory);
  await atomicWrite(target, formatDocumentConfig(config));
  return target;
}
