import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command, InvalidArgumentError } from "commander";
import { z } from "zod";
import { loadConfig } from "../config/loader.js";
import type { ValidationOptions } from "../config/schema.js";
import { buildGraph } from "../graph/builder.js";
import { formatItemFile } from "../items/codec.js";
import { displayText } from "../items/display.js";
import { ITEM_TYPES, type ItemType } from "../items/types.js";
import {
  addItem,
  clearSuspectLinks,
  createDocument,
  deleteDocument,
  linkItems,
  listDocuments,
  listItems,
  markReviewed,
  removeItem,
  resetReview,
  showItem,
  unlinkItems,
} from "../operations/index.js";
import { formatHumanReport } from "../reporter/human.js";
import { formatJsonReport } from "../reporter/json.js";
import { escalate, exitCodeFor } from "../validation/severity.js";
import { omitSkippedDocuments, validate } from "../validation/validator.js";

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const raw: unknown = JSON.parse(readFileSync(join(here, "..", "..", "package.json"), "utf-8"));
  return packageJsonSchema.parse(raw).version;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) throw new InvalidArgumentError("Not a number.");
  return parsed;
}

function parseItemType(value: string): ItemType {
  const match = ITEM_TYPES.find((type) => type === value);
  if (!match) throw new InvalidArgumentError(`Expected one of: ${ITEM_TYPES.join(", ")}.`);
  return match;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/** Run a command body, reporting failures on stderr with exit code 1. */
async function run(body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
}

function rootOf(opts: { root?: string }): string {
  return opts.root ?? process.cwd();
}

export interface ValidateCliOptions {
  root?: string;
  childCheck: boolean;
  suspectCheck: boolean;
  reviewCheck: boolean;
  skip?: string[];
  warnAll?: boolean;
  errorAll?: boolean;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/** Project configuration overlaid with command-line flags. */
export function mergeValidationOptions(base: ValidationOptions, opts: ValidateCliOptions): ValidationOptions {
  return {
    ...base,
    checks: {
      ...base.checks,
      childLinkage: base.checks.childLinkage && opts.childCheck,
      suspectLinks: base.checks.suspectLinks && opts.suspectCheck,
      reviewStatus: base.checks.reviewStatus && opts.reviewCheck,
    },
    skip: [...new Set([...base.skip, ...(opts.skip ?? [])])],
    warnAll: base.warnAll || opts.warnAll === true,
    errorAll: base.errorAll || opts.errorAll === true,
  };
}

function addValidateCommand(program: Command): void {
  program
    .command("validate")
    .description("Validate the traceability graph of a project")
    .option("--root <dir>", "Project root (default: current directory)")
    .option("-C, --no-child-check", "Skip the child-linkage check")
    .option("-S, --no-suspect-check", "Skip the suspect-link check")
    .option("-W, --no-review-check", "Skip the review-status check")
    .option("-s, --skip <prefix...>", "Skip issues about these documents")
    .option("-w, --warn-all", "Report info issues as warnings")
    .option("-e, --error-all", "Report warnings as errors")
    .option("--json", "Output a JSON report")
    .option("-v, --verbose", "Include info issues and diagnostics")
    .option("-q, --quiet", "Only show errors")
    .action((opts: ValidateCliOptions) =>
      run(async () => {
        const root = rootOf(opts);
        const config = await loadConfig(root);
        const options = mergeValidationOptions(config.validation, opts);
        const build = await buildGraph(root, { ignore: config.ignore });
        if (opts.verbose) {
          console.error(`debug: loaded ${plural(build.documents.size, "document")} from ${build.root}`);
          console.error(`debug: loaded ${plural(build.graph.size, "item")}`);
        }

        const loadIssues = omitSkippedDocuments(build.issues, options.skip);
        const issues = [...escalate(loadIssues, options), ...validate(build.graph, options)];
        console.log(opts.json ? formatJsonReport(issues) : formatHumanReport(issues, opts));
        process.exitCode = exitCodeFor(issues);
      }),
    );
}

function addDocCommands(program: Command): void {
  const doc = program.command("doc").description("Manage documents");

  doc
    .command("create <prefix> <path>")
    .description("Create a document in <path> (relative to the project root)")
    .option("--root <dir>", "Project root")
    .option("-p, --parent <prefix...>", "Parent documents")
    .option("-d, --digits <n>", "Digits in item numbers", parseInteger)
    .option("--sep <sep>", "Separator between prefix and number")
    .action((prefix: string, path: string, opts: { root?: string; parent?: string[]; digits?: number; sep?: string }) =>
      run(async () => {
        const created = await createDocument(rootOf(opts), {
          prefix,
          path,
          parents: opts.parent,
          digits: opts.digits,
          sep: opts.sep,
        });
        console.log(`Created document ${created.prefix} at ${created.path}`);
      }),
    );

  doc
    .command("delete <prefix>")
    .description("Delete a document and its items")
    .option("--root <dir>", "Project root")
    .option("-f, --force", "Delete even if other items link into it")
    .option("--cascade", "Remove links into the document from other items first")
    .action((prefix: string, opts: { root?: string; force?: boolean; cascade?: boolean }) =>
      run(async () => {
        const result = await deleteDocument(rootOf(opts), prefix, opts);
        console.log(`Deleted document ${prefix} (${plural(result.removedItems.length, "item")})`);
        if (result.unlinkedItems.length > 0) {
          console.log(`Removed links from: ${result.unlinkedItems.join(", ")}`);
        }
        for (const link of result.danglingLinks) {
          console.error(`warning: dangling link ${link}`);
        }
      }),
    );

  doc
    .command("list")
    .description("List documents")
    .option("--root <dir>", "Project root")
    .action((opts: { root?: string }) =>
      run(async () => {
        for (const summary of await listDocuments(rootOf(opts))) {
          const parents = summary.parents.length > 0 ? ` <- ${summary.parents.join(", ")}` : "";
          console.log(`${summary.prefix}${parents}  ${summary.path}  (${plural(summary.itemCount, "item")})`);
        }
      }),
    );
}

interface ItemAddCliOptions {
  root?: string;
  text?: string;
  header?: string;
  type?: ItemType;
  link?: string[];
  derived?: boolean;
  testable: boolean;
}

function addItemCommands(program: Command): void {
  const item = program.command("item").description("Manage items");

  item
    .command("add <prefix>")
    .description("Add an item to a document")
    .option("--root <dir>", "Project root")
    .option("-t, --text <text>", "Item text")
    .option("--header <header>", "Item header")
    .option("--type <type>", "requirement, heading or info", parseItemType)
    .option("-l, --link <uid...>", "Parent items")
    .option("--derived", "Exempt from parent linkage")
    .option("--no-testable", "Mark as not testable")
    .action((prefix: string, opts: ItemAddCliOptions) =>
      run(async () => {
        const created = await addItem(rootOf(opts), prefix, {
          text: opts.text,
          header: opts.header,
          type: opts.type,
          links: opts.link,
          derived: opts.derived,
          testable: opts.testable,
        });
        console.log(`Added ${created.uid}`);
      }),
    );

  item
    .command("remove <uid>")
    .description("Remove an item")
    .option("--root <dir>", "Project root")
    .action((uid: string, opts: { root?: string }) =>
      run(async () => {
        const result = await removeItem(rootOf(opts), uid);
        console.log(`Removed ${result.item.uid}`);
        if (result.linkedFrom.length > 0) {
          console.error(`warning: still linked from ${result.linkedFrom.join(", ")}`);
        }
      }),
    );

  item
    .command("show <uid>")
    .description("Print an item")
    .option("--root <dir>", "Project root")
    .action((uid: string, opts: { root?: string }) =>
      run(async () => {
        const found = await showItem(rootOf(opts), uid);
        console.log(`# ${found.uid}`);
        console.log(formatItemFile(found).trimEnd());
      }),
    );

  item
    .command("list [prefix]")
    .description("List items of one document, or of all documents")
    .option("--root <dir>", "Project root")
    .action((prefix: string | undefined, opts: { root?: string }) =>
      run(async () => {
        for (const listed of await listItems(rootOf(opts), prefix)) {
          const marker = listed.active ? "" : " (inactive)";
          console.log(`${listed.uid}${marker}  ${displayText(listed)}`);
        }
      }),
    );
}

function addLinkCommands(program: Command): void {
  const link = program.command("link").description("Manage links between items");

  link
    .command("add <child> <parent>")
    .description("Link a child item to a parent item")
    .option("--root <dir>", "Project root")
    .option("--verify", "Store the parent's current hash")
    .action((child: string, parent: string, opts: { root?: string; verify?: boolean }) =>
      run(async () => {
        const updated = await linkItems(rootOf(opts), child, parent, opts);
        console.log(`Linked ${updated.uid} -> ${parent}`);
      }),
    );

  link
    .command("remove <child> <parent>")
    .description("Remove a link")
    .option("--root <dir>", "Project root")
    .action((child: string, parent: string, opts: { root?: string }) =>
      run(async () => {
        const updated = await unlinkItems(rootOf(opts), child, parent);
        console.log(`Unlinked ${updated.uid} -> ${parent}`);
      }),
    );
}

function addReviewCommands(program: Command): void {
  const review = program.command("review").description("Review and link verification");

  review
    .command("mark <label>")
    .description("Mark items as reviewed (uid, document prefix or 'all')")
    .option("--root <dir>", "Project root")
    .action((label: string, opts: { root?: string }) =>
      run(async () => {
        const updated = await markReviewed(rootOf(opts), label);
        console.log(`Marked ${plural(updated.length, "item")} as reviewed`);
      }),
    );

  review
    .command("clear <label> [parents...]")
    .description("Clear suspect links (optionally only links to the given parents)")
    .option("--root <dir>", "Project root")
    .action((label: string, parents: string[], opts: { root?: string }) =>
      run(async () => {
        const updated = await clearSuspectLinks(rootOf(opts), label, parents.length > 0 ? parents : undefined);
        console.log(`Cleared suspect links on ${plural(updated.length, "item")}`);
      }),
    );

  review
    .command("reset <label>")
    .description("Clear review status and stored link hashes")
    .option("--root <dir>", "Project root")
    .action((label: string, opts: { root?: string }) =>
      run(async () => {
        const updated = await resetReview(rootOf(opts), label);
        console.log(`Reset review of ${plural(updated.length, "item")}`);
      }),
    );
}

export function buildProgram(): Command {
  const program = new Command();
  program.name("reqgraph").description("Requirements traceability graph").version(readVersion());

  addValidateCommand(program);
  addDocCommands(program);
  addItemCommands(program);
  addLinkCommands(program);
  addReviewCommands(program);
  return program;
}
