import { describe, it, expect } from "vitest";
import { contentHash } from "../../src/items/hash.js";
import { makeItem } from "../helpers.js";

describe("contentHash", () => {
  const base = makeItem({
    uid: "SRS001",
    text: "The system shall log events.",
    links: [
      { parentUid: "SYS002", storedHash: null },
      { parentUid: "SYS001", storedHash: null },
    ],
  });

  it("hashes text, header, sorted parent uids and type", () => {
    expect(contentHash(base)).toBe("-UHEMErWcNIleWWGVTy289PlsrfwH95TA_r2-M4cIkE");
  });

  it("is URL-safe base64 without padding", () => {
    expect(contentHash(base)).toMatch(/^[A-Za-z0-9_-]{43}$/);
  });

  it("ignores link order and stored hashes", () => {
    const reordered = {
      ...base,
      links: [
        { parentUid: "SYS001", storedHash: "aaaaaaaaaaaaaaaaaaaaaaaa" },
        { parentUid: "SYS002", storedHash: null },
      ],
    };

    expect(contentHash(reordered)).toBe(contentHash(base));
  });

  it("ignores review state, activity and custom attributes", () => {
    const other = { ...base, reviewed: "x", active: false, customAttributes: { owner: "qa" } };

    expect(contentHash(other)).toBe(contentHash(base));
  });

  it("treats a missing header like an empty one", () => {
    expect(contentHash({ ...base, header: "" })).toBe(contentHash(base));
  });

  it("normalizes text to NFC", () => {
    const composed = { ...base, text: "caf\u00e9" };
    const decomposed = { ...base, text: "cafe\u0301" };

    expect(contentHash(decomposed)).toBe(contentHash(composed));
  });

  it.each([
    ["text", { text: "The system shall log all events." }],
    ["header", { header: "Logging" }],
    ["type", { type: "info" as const }],
    ["links", { links: [{ parentUid: "SYS001", storedHash: null }] }],
  ])("changes when %s changes", (_field, change) => {
    expect(contentHash({ ...base, ...change })).not.toBe(contentHash(base));
  });
});
