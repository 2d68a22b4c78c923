import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import { rm } from "node:fs/promises";
import type { Command } from "commander";
import { buildProgram, mergeValidationOptions } from "../../src/cli/program.js";
import { validationOptionsSchema } from "../../src/config/schema.js";
import { makeTempDir, writeItemYaml } from "../helpers.js";

const dirs: string[] = [];
let logs: string[] = [];
let errors: string[] = [];

beforeEach(() => {
  logs = [];
  errors = [];
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    logs.push(args.join(" "));
  });
  vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    errors.push(args.join(" "));
  });
});

afterEach(async () => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  for (const d of dirs) await rm(d, { recursive: true, force: true });
  dirs.length = 0;
});

// Subcommands copy exit handling only when created, so apply it to each one.
function withExitOverride(command: Command): Command {
  command.exitOverride();
  for (const sub of command.commands) withExitOverride(sub);
  return command;
}

async function run(...args: string[]): Promise<void> {
  await withExitOverride(buildProgram()).parseAsync(args, { from: "user" });
}

async function tempRoot(): Promise<string> {
  const root = await makeTempDir();
  dirs.push(root);
  return root;
}

describe("reqgraph CLI", () => {
  it("creates documents and items, then validates", async () => {
    const root = await tempRoot();

    await run("doc", "create", "SYS", "sys", "--root", root);
    await run("doc", "create", "SRS", "srs", "--parent", "SYS", "--root", root);
    await run("item", "add", "SYS", "--text", "The system shall log events.", "--root", root);
    await run("item", "add", "SRS", "--text", "Write events to a file.", "--link", "SYS001", "--root", root);

    expect(logs).toEqual([
      expect.stringMatching(/^Created document SYS at /),
      expect.stringMatching(/^Created document SRS at /),
      "Added SYS001",
      "Added SRS001",
    ]);

    logs = [];
    await run("validate", "--root", root);

    expect(logs).toEqual([
      [
        "[WARNING] SRS001 link to SYS001 has never been verified",
        "[WARNING] SRS001 has not been reviewed",
        "[WARNING] SYS001 has not been reviewed",
        "",
        "Validation passed with 3 warnings",
      ].join("\n"),
    ]);
    expect(process.exitCode).toBe(0);
  });

  it("fails validation under --error-all", async () => {
    const root = await tempRoot();
    await run("doc", "create", "SYS", "sys", "--root", root);
    await run("item", "add", "SYS", "--text", "x", "--root", root);
    logs = [];

    await run("validate", "--root", root, "--error-all", "--quiet");

    expect(logs).toEqual(["[ERROR] SYS001 has not been reviewed\n\nValidation failed with 1 error"]);
    expect(process.exitCode).toBe(1);
  });

  it("prints a JSON report", async () => {
    const root = await tempRoot();
    await run("doc", "create", "SYS", "sys", "--root", root);
    logs = [];

    await run("validate", "--root", root, "--json");

    expect(JSON.parse(logs[0])).toMatchObject({
      passed: true,
      counts: { error: 0, warning: 1, info: 0 },
      issues: [{ code: "empty-document", subject: "SYS" }],
    });
  });

  it("leaves out load issues of skipped documents", async () => {
    const root = await tempRoot();
    await run("doc", "create", "SYS", "sys", "--root", root);
    await run("doc", "create", "SRS", "srs", "--parent", "SYS", "--root", root);
    await run("item", "add", "SYS", "--text", "Parent", "--root", root);
    await run("review", "mark", "all", "--root", root);
    await writeItemYaml(root, "srs", "SRS001", "type: story\n");
    logs = [];

    await run("validate", "--root", root, "--skip", "SRS");

    expect(logs).toEqual(["Validation passed - no issues found"]);
    expect(process.exitCode).toBe(0);
  });

  it("runs the review commands", async () => {
    const root = await tempRoot();
    await run("doc", "create", "SYS", "sys", "--root", root);
    await run("doc", "create", "SRS", "srs", "--parent", "SYS", "--root", root);
    await run("item", "add", "SYS", "--text", "Parent", "--root", root);
    await run("item", "add", "SRS", "--text", "Child", "--root", root);
    await run("link", "add", "SRS001", "SYS001", "--verify", "--root", root);
    logs = [];

    await run("review", "mark", "all", "--root", root);
    await run("validate", "--root", root);

    expect(logs).toEqual(["Marked 2 items as reviewed", "Validation passed - no issues found"]);
  });

  it("reports failures on stderr with exit code 1", async () => {
    const root = await tempRoot();

    await run("item", "show", "SYS001", "--root", root);

    expect(errors).toEqual(["Error: Item 'SYS001' not found"]);
    expect(process.exitCode).toBe(1);
  });

  it("rejects unknown item types", async () => {
    const root = await tempRoot();

    await expect(run("item", "add", "SYS", "--type", "story", "--root", root)).rejects.toThrow(
      "Expected one of: requirement, heading, info.",
    );
  });
});

describe("mergeValidationOptions", () => {
  it("lets flags turn checks off and add skips", () => {
    const base = validationOptionsSchema.parse({ skip: ["HAZ"], checks: { reviewStatus: false } });

    const merged = mergeValidationOptions(base, {
      childCheck: false,
      suspectCheck: true,
      reviewCheck: true,
      skip: ["UT", "HAZ"],
      warnAll: true,
    });

    expect(merged.checks.childLinkage).toBe(false);
    expect(merged.checks.suspectLinks).toBe(true);
    expect(merged.checks.reviewStatus).toBe(false);
    expect(merged.skip).toEqual(["HAZ", "UT"]);
    expect(merged.warnAll).toBe(true);
    expect(merged.errorAll).toBe(false);
  });
});
