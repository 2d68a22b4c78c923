import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { ConfigError, isErrnoCode, toIOError } from "../errors.js";
import { formatZodIssues } from "../utils/zod.js";
import { reqgraphConfigSchema, type ReqgraphConfig } from "./schema.js";

export const PROJECT_CONFIG_FILE = ".reqgraph.json";

/**
 * Load `.reqgraph.json` from the project root. A missing file means all
 * defaults; unreadable files propagate as IOError.
 */
export async function loadConfig(projectDir: string = process.cwd()): Promise<ReqgraphConfig> {
  const path = join(projectDir, PROJECT_CONFIG_FILE);
  let raw: unknown = {};

  try {
    const content = await readFile(path, "utf-8");
    try {
      raw = JSON.parse(content);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Invalid JSON in ${path}: ${reason}`, { path });
    }
  } catch (err: unknown) {
    if (err instanceof ConfigError) throw err;
    if (!isErrnoCode(err, "ENOENT")) throw toIOError(err, "read", path);
    // No config file: defaults apply
  }

  const parsed = reqgraphConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${PROJECT_CONFIG_FILE}: ${formatZodIssues(parsed.error)}`, { path });
  }
  return parsed.data;
}
