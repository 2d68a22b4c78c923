import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("node:fs/promises", () => ({
  readFile: vi.fn(),
}));

import { readFile } from "node:fs/promises";
import { loadConfig } from "../../src/config/loader.js";
import { ConfigError, IOError } from "../../src/errors.js";

const mockReadFile = vi.mocked(readFile);

function errno(code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(code), { code });
}

describe("loadConfig", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("loads and parses a .reqgraph.json file", async () => {
    mockReadFile.mockResolvedValue(
      JSON.stringify({
        validation: { skip: ["HAZ"], warnAll: true, checks: { emptyText: false } },
        links: { encoding: "plain" },
      }),
    );

    const config = await loadConfig("/fake/project");

    expect(mockReadFile).toHaveBeenCalledWith("/fake/project/.reqgraph.json", "utf-8");
    expect(config.validation.skip).toEqual(["HAZ"]);
    expect(config.validation.warnAll).toBe(true);
    expect(config.validation.checks.emptyText).toBe(false);
    expect(config.validation.checks.suspectLinks).toBe(true);
    expect(config.links.encoding).toBe("plain");
  });

  it("returns defaults when no config file exists", async () => {
    mockReadFile.mockRejectedValue(errno("ENOENT"));

    const config = await loadConfig("/fake/project");

    expect(config.validation.severity).toEqual({ childLinkage: "info", unlinkedItems: "warning" });
    expect(config.validation.errorAll).toBe(false);
    expect(config.links.encoding).toBe("auto");
    expect(config.ignore).toEqual(["node_modules", ".git"]);
  });

  it("throws ConfigError for invalid JSON", async () => {
    mockReadFile.mockResolvedValue("{ not json");

    await expect(loadConfig("/fake/project")).rejects.toThrow(ConfigError);
  });

  it("throws ConfigError for schema violations", async () => {
    mockReadFile.mockResolvedValue(JSON.stringify({ validation: { severity: { childLinkage: "fatal" } } }));

    await expect(loadConfig("/fake/project")).rejects.toThrow(/validation\.severity\.childLinkage/);
  });

  it("propagates other read failures as IOError", async () => {
    mockReadFile.mockRejectedValue(errno("EACCES"));

    await expect(loadConfig("/fake/project")).rejects.toThrow(IOError);
  });
});
