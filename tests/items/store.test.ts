import { describe, it, expect, afterEach } from "vitest";
import { mkdir, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Document } from "../../src/documents/types.js";
import { NotFoundError } from "../../src/errors.js";
import {
  allocateUid,
  deleteItemFile,
  itemPath,
  listItemUids,
  loadDocumentItems,
  readItem,
  writeItem,
} from "../../src/items/store.js";
import { makeItem, makeTempDir } from "../helpers.js";

const dirs: string[] = [];

afterEach(async () => {
  for (const d of dirs) await rm(d, { recursive: true, force: true });
  dirs.length = 0;
});

async function tempDoc(overrides: Partial<Document> = {}): Promise<Document> {
  const root = await makeTempDir();
  dirs.push(root);
  const path = join(root, "srs");
  await mkdir(path, { recursive: true });
  return { prefix: "SRS", parents: [], digits: 3, sep: "", path, ...overrides };
}

describe("item store", () => {
  it("lists only item files, sorted", async () => {
    const doc = await tempDoc();
    for (const name of ["SRS002.yml", "SRS001.yml", "notes.yml", ".reqgraph.yml", "SYS001.yml"]) {
      await writeFile(join(doc.path, name), "text: x\n", "utf-8");
    }

    expect(await listItemUids(doc)).toEqual(["SRS001", "SRS002"]);
  });

  it("lists nothing for a missing directory", async () => {
    const doc = await tempDoc();

    expect(await listItemUids({ ...doc, path: join(doc.path, "missing") })).toEqual([]);
  });

  it("writes and reads an item", async () => {
    const doc = await tempDoc();
    const item = makeItem({ uid: "SRS001", text: "Log events." });

    const path = await writeItem(doc, item);

    expect(path).toBe(itemPath(doc, "SRS001"));
    expect((await readItem(doc, "SRS001")).item).toEqual(item);
  });

  it("leaves no temp files behind", async () => {
    const doc = await tempDoc();

    await writeItem(doc, makeItem({ uid: "SRS001" }));
    await writeItem(doc, makeItem({ uid: "SRS001", text: "again" }));

    expect(await readdir(doc.path)).toEqual(["SRS001.yml"]);
  });

  it("throws NotFoundError for a missing item", async () => {
    const doc = await tempDoc();

    await expect(readItem(doc, "SRS009")).rejects.toThrow(NotFoundError);
    await expect(deleteItemFile(doc, "SRS009")).rejects.toThrow(NotFoundError);
  });

  it("loads a document, collecting unparseable files", async () => {
    const doc = await tempDoc();
    await writeFile(join(doc.path, "SRS001.yml"), "text: one\n", "utf-8");
    await writeFile(join(doc.path, "SRS002.yml"), "text: [broken\n", "utf-8");
    await writeFile(join(doc.path, "SRS003.yml"), "text: three\nlinks:\n  - 7\n", "utf-8");

    const loaded = await loadDocumentItems(doc);

    expect(loaded.items.map((parsed) => parsed.item.uid)).toEqual(["SRS001", "SRS003"]);
    expect(loaded.items[1].warnings).toEqual(["link entry in SRS003 is not a uid: 7, skipping"]);
    expect(loaded.failures.map((failure) => failure.uid)).toEqual(["SRS002"]);
    expect(loaded.failures[0].path).toBe(join(doc.path, "SRS002.yml"));
  });

  it("allocates uids from the files on disk", async () => {
    const doc = await tempDoc({ sep: "-", digits: 2 });

    expect(await allocateUid(doc)).toBe("SRS-01");
    await writeItem(doc, makeItem({ uid: "SRS-04", documentPrefix: "SRS" }));
    expect(await allocateUid(doc)).toBe("SRS-05");
  });

  it("deletes item files", async () => {
    const doc = await tempDoc();
    await writeItem(doc, makeItem({ uid: "SRS001" }));

    await deleteItemFile(doc, "SRS001");

    expect(await listItemUids(doc)).toEqual([]);
  });
});
