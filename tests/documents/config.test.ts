import { describe, it, expect, afterEach } from "vitest";
import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import {
  formatDocumentConfig,
  loadDocumentConfig,
  parseDocumentConfig,
  saveDocumentConfig,
} from "../../src/documents/config.js";
import { ConfigError } from "../../src/errors.js";
import { makeTempDir } from "../helpers.js";

describe("parseDocumentConfig", () => {
  it("applies defaults for digits, sep and parents", () => {
    const config = parseDocumentConfig("settings:\n  prefix: SYS\n", "SYS/.reqgraph.yml");

    expect(config).toEqual({ prefix: "SYS", parents: [], digits: 3, sep: "" });
  });

  it("accepts a single parent written as a scalar", () => {
    const config = parseDocumentConfig("settings:\n  prefix: SRS\n  parents: SYS\n  digits: 4\n  sep: '-'\n", "x");

    expect(config).toEqual({ prefix: "SRS", parents: ["SYS"], digits: 4, sep: "-" });
  });

  it("accepts a list of parents and a null separator", () => {
    const config = parseDocumentConfig("settings:\n  prefix: UT\n  parents: [SRS, HAZ]\n  sep: null\n", "x");

    expect(config.parents).toEqual(["SRS", "HAZ"]);
    expect(config.sep).toBe("");
  });

  it.each([
    ["lowercase prefix", "settings:\n  prefix: sys\n"],
    ["one-letter prefix", "settings:\n  prefix: S\n"],
    ["digits out of range", "settings:\n  prefix: SYS\n  digits: 11\n"],
    ["alphanumeric separator", "settings:\n  prefix: SYS\n  sep: x\n"],
    ["missing settings", "prefix: SYS\n"],
  ])("rejects %s", (_label, content) => {
    expect(() => parseDocumentConfig(content, "bad.yml")).toThrow(ConfigError);
  });

  it("rejects invalid YAML with the source in the message", () => {
    expect(() => parseDocumentConfig("settings: [unclosed\n", "SYS/.reqgraph.yml")).toThrow(
      /Invalid YAML in SYS\/\.reqgraph\.yml/,
    );
  });
});

describe("document config files", () => {
  const dirs: string[] = [];

  afterEach(async () => {
    for (const d of dirs) await rm(d, { recursive: true, force: true });
    dirs.length = 0;
  });

  it("omits parents for root documents", () => {
    const text = formatDocumentConfig({ prefix: "SYS", parents: [], digits: 3, sep: "" });

    expect(text).not.toContain("parents");
    expect(parseDocumentConfig(text, "x")).toEqual({ prefix: "SYS", parents: [], digits: 3, sep: "" });
  });

  it("saves atomically and loads back", async () => {
    const root = await makeTempDir();
    dirs.push(root);
    const config = { prefix: "SRS", parents: ["SYS"], digits: 2, sep: "-" };

    const path = await saveDocumentConfig(config, join(root, "reqs", "srs"));

    expect(path).toBe(join(root, "reqs", "srs", ".reqgraph.yml"));
    expect(await loadDocumentConfig(path)).toEqual(config);
    expect(await readFile(path, "utf-8")).toContain("prefix: SRS");
  });
});
