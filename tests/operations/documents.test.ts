import { describe, it, expect, afterEach } from "vitest";
import { access, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { ConfigError, ConflictError, NotFoundError } from "../../src/errors.js";
import { createDocument, deleteDocument, listDocuments } from "../../src/operations/documents.js";
import { addItem, showItem } from "../../src/operations/items.js";
import { makeTempDir } from "../helpers.js";

const dirs: string[] = [];

afterEach(async () => {
  for (const d of dirs) await rm(d, { recursive: true, force: true });
  dirs.length = 0;
});

async function tempRoot(): Promise<string> {
  const root = await makeTempDir();
  dirs.push(root);
  return root;
}

async function exists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false,
  );
}

describe("createDocument", () => {
  it("writes the document config", async () => {
    const root = await tempRoot();

    const doc = await createDocument(root, { prefix: "SYS", path: "reqs/sys" });

    expect(doc).toEqual({ prefix: "SYS", parents: [], digits: 3, sep: "", path: join(root, "reqs", "sys") });
    expect(await readFile(join(root, "reqs", "sys", ".reqgraph.yml"), "utf-8")).toContain("prefix: SYS");
  });

  it("links to existing parent documents", async () => {
    const root = await tempRoot();
    await createDocument(root, { prefix: "SYS", path: "sys" });

    await createDocument(root, { prefix: "SRS", path: "srs", parents: ["SYS"], sep: "-", digits: 2 });

    const docs = await listDocuments(root);
    expect(docs.map((doc) => [doc.prefix, doc.parents, doc.itemCount])).toEqual([
      ["SRS", ["SYS"], 0],
      ["SYS", [], 0],
    ]);
  });

  it("rejects invalid settings", async () => {
    const root = await tempRoot();

    await expect(createDocument(root, { prefix: "sys", path: "sys" })).rejects.toThrow(ConfigError);
    await expect(createDocument(root, { prefix: "SYS", path: "sys", sep: "a" })).rejects.toThrow(ConfigError);
    await expect(createDocument(root, { prefix: "SYS", path: "sys", digits: 0 })).rejects.toThrow(ConfigError);
  });

  it("rejects duplicate prefixes and unknown parents", async () => {
    const root = await tempRoot();
    await createDocument(root, { prefix: "SYS", path: "sys" });

    await expect(createDocument(root, { prefix: "SYS", path: "other" })).rejects.toThrow(ConflictError);
    await expect(createDocument(root, { prefix: "SRS", path: "srs", parents: ["NOPE"] })).rejects.toThrow(
      NotFoundError,
    );
  });
});

describe("deleteDocument", () => {
  async function linkedProject(): Promise<string> {
    const root = await tempRoot();
    await createDocument(root, { prefix: "SYS", path: "sys" });
    await createDocument(root, { prefix: "SRS", path: "srs", parents: ["SYS"] });
    await addItem(root, "SYS", { text: "Parent" });
    await addItem(root, "SRS", { text: "Child", links: ["SYS001"] });
    return root;
  }

  it("refuses while other items link into the document", async () => {
    const root = await linkedProject();

    await expect(deleteDocument(root, "SYS")).rejects.toThrow(
      "Document SYS is still linked from other documents: SRS001 -> SYS001",
    );
  });

  it("deletes anyway with force, leaving links dangling", async () => {
    const root = await linkedProject();

    const result = await deleteDocument(root, "SYS", { force: true });

    expect(result.removedItems).toEqual(["SYS001"]);
    expect(result.danglingLinks).toEqual(["SRS001 -> SYS001"]);
    expect(await exists(join(root, "sys"))).toBe(false);
    expect((await showItem(root, "SRS001")).links).toEqual([{ parentUid: "SYS001", storedHash: null }]);
  });

  it("removes the referencing links with cascade", async () => {
    const root = await linkedProject();

    const result = await deleteDocument(root, "SYS", { cascade: true });

    expect(result.unlinkedItems).toEqual(["SRS001"]);
    expect(result.danglingLinks).toEqual([]);
    expect((await showItem(root, "SRS001")).links).toEqual([]);
  });

  it("keeps the directory when other files remain", async () => {
    const root = await tempRoot();
    await createDocument(root, { prefix: "SYS", path: "sys" });
    await createDocument(root, { prefix: "SUB", path: "sys/sub", parents: ["SYS"] });

    await deleteDocument(root, "SYS");

    expect(await exists(join(root, "sys", ".reqgraph.yml"))).toBe(false);
    expect(await exists(join(root, "sys", "sub", ".reqgraph.yml"))).toBe(true);
  });

  it("throws NotFoundError for unknown prefixes", async () => {
    const root = await tempRoot();

    await expect(deleteDocument(root, "NOPE")).rejects.toThrow("Document 'NOPE' not found");
  });
});
