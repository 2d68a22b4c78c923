import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { randomUUID } from "node:crypto";
import { toIOError } from "../errors.js";

/**
 * Write to a temp file beside the target, then rename over it. Readers see
 * either the old content or the new content, never a partial file.
 */
export async function atomicWrite(targetPath: string, content: string): Promise<void> {
  const temp = `${targetPath}.${randomUUID()}.tmp`;
  try {
    await mkdir(dirname(targetPath), { recursive: true });
    await writeFile(temp, content, "utf-8");
    await rename(temp, targetPath);
  } catch (err: unknown) {
    await rm(temp, { force: true });
    throw toIOError(err, "write", targetPath);
  }
}

/** Read a UTF-8 file, converting filesystem failures to IOError. */
export async function readTextFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (err: unknown) {
    throw toIOError(err, "read", path);
  }
}
