import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Item } from "../src/items/types.js";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "reqgraph-test-"));
}

export interface DocSettings {
  prefix: string;
  parents?: string[];
  digits?: number;
  sep?: string;
}

/** Write `<root>/<dir>/.reqgraph.yml`. */
export async function writeDoc(root: string, dir: string, settings: DocSettings): Promise<string> {
  const path = join(root, dir);
  await mkdir(path, { recursive: true });
  const lines = ["settings:", `  prefix: ${settings.prefix}`];
  if (settings.digits !== undefined) lines.push(`  digits: ${settings.digits}`);
  if (settings.sep !== undefined) lines.push(`  sep: "${settings.sep}"`);
  if (settings.parents && settings.parents.length > 0) {
    lines.push("  parents:", ...settings.parents.map((parent) => `    - ${parent}`));
  }
  await writeFile(join(path, ".reqgraph.yml"), `${lines.join("\n")}\n`, "utf-8");
  return path;
}

/** Write `<root>/<dir>/<uid>.yml` with raw YAML content. */
export async function writeItemYaml(root: string, dir: string, uid: string, content: string): Promise<string> {
  const path = join(root, dir, `${uid}.yml`);
  await writeFile(path, content, "utf-8");
  return path;
}

export function makeItem(overrides: Partial<Item> & { uid: string }): Item {
  return {
    documentPrefix: overrides.uid.replace(/[^A-Za-z0-9]*\d+$/, ""),
    text: `Text of ${overrides.uid}`,
    header: null,
    type: "requirement",
    active: true,
    derived: false,
    testable: true,
    links: [],
    reviewed: null,
    customAttributes: {},
    ...overrides,
  };
}

/** Links without stored hashes. */
export function linksTo(...uids: string[]): Item["links"] {
  return uids.map((parentUid) => ({ parentUid, storedHash: null }));
}
