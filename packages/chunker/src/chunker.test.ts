import { describe, it, expect } from "vitest";
import { ConfigurationError } from "@collabrag/errors";
import type { CanonicalDocument } from "@collabrag/types";
import { CharChunker } from "./char-chunker.js";
import { WordChunker } from "./word-chunker.js";
import { createChunker, chunkText } from "./factory.js";
import { chunkDocument, chunkId, fingerprint } from "./fingerprint.js";

describe("CharChunker", () => {
  const chunker = new CharChunker();

  it("has unit 'char'", () => {
    expect(chunker.unit).toBe("char");
  });

  it("advances each window by chunkSize - chunkOverlap", () => {
    const results = chunker.chunk("ABCDEFGHIJ", { chunkSize: 4, chunkOverlap: 2 });

    expect(results.map((r) => r.content)).toEqual(["ABCD", "CDEF", "EFGH", "GHIJ"]);
    expect(results.map((r) => r.metadata)).toEqual([
      { start: 0, end: 4 },
      { start: 2, end: 6 },
      { start: 4, end: 8 },
      { start: 6, end: 10 },
    ]);
    expect(results.map((r) => r.index)).toEqual([0, 1, 2, 3]);
  });

  it("keeps a short final window", () => {
    expect(chunkText("ABCDEFGHIJK", 4, 2)).toEqual(["ABCD", "CDEF", "EFGH", "GHIJ", "IJK"]);
  });

  it("returns one chunk when the text fits", () => {
    expect(chunkText("ABC", 4, 2)).toEqual(["ABC"]);
    expect(chunkText("ABCD", 4, 0)).toEqual(["ABCD"]);
  });

  it("produces disjoint windows without overlap", () => {
    expect(chunkText("ABCDEFGH", 3, 0)).toEqual(["ABC", "DEF", "GH"]);
  });

  it("returns zero chunks for empty or blank input", () => {
    expect(chunker.chunk("", { chunkSize: 4, chunkOverlap: 2 })).toEqual([]);
    expect(chunker.chunk("   \n ", { chunkSize: 4, chunkOverlap: 2 })).toEqual([]);
  });

  it("counts astral characters as one and never splits a surrogate pair", () => {
    const results = chunker.chunk("AB😀CD", { chunkSize: 3, chunkOverlap: 0 });

    expect(results.map((r) => r.content)).toEqual(["AB😀", "CD"]);
    expect(results.map((r) => r.metadata)).toEqual([
      { start: 0, end: 3 },
      { start: 3, end: 5 },
    ]);
  });

  it("gives differently fingerprinted chunks to texts that differ only in an emoji", () => {
    const first = chunkText("AB😀", 3, 0);
    const second = chunkText("AB😁", 3, 0);

    expect(first).toEqual(["AB😀"]);
    expect(second).toEqual(["AB😁"]);
    expect(fingerprint(first[0] ?? "")).not.toBe(fingerprint(second[0] ?? ""));
  });

  it("is deterministic across calls", () => {
    const text = "The quick brown fox jumps over the lazy dog. ".repeat(20);
    expect(chunkText(text, 37, 11)).toEqual(chunkText(text, 37, 11));
  });

  it("rejects overlap that is not smaller than the size", () => {
    expect(() => chunkText("ABCDEFGHIJ", 4, 4)).toThrow(ConfigurationError);
    expect(() => chunkText("ABCDEFGHIJ", 4, 5)).toThrow(
      "chunkOverlap (5) must be smaller than chunkSize (4)",
    );
  });

  it("rejects non-positive sizes and negative overlap even for empty text", () => {
    expect(() => chunkText("", 0, 0)).toThrow(ConfigurationError);
    expect(() => chunkText("", 4, -1)).toThrow("chunkOverlap must be a non-negative integer");
  });
});

describe("WordChunker", () => {
  const chunker = new WordChunker();

  it("windows over words and joins them with single spaces", () => {
    const results = chunker.chunk("one  two\nthree four\tfive six", {
      chunkSize: 3,
      chunkOverlap: 1,
    });

    expect(results.map((r) => r.content)).toEqual(["one two three", "three four five", "five six"]);
    expect(results[2]?.metadata).toEqual({ start: 4, end: 6 });
  });

  it("returns zero chunks for whitespace", () => {
    expect(chunker.chunk(" \n\t", { chunkSize: 3, chunkOverlap: 1 })).toEqual([]);
  });

  it("never exceeds chunkSize words per chunk", () => {
    const content = Array.from({ length: 150 }, (_, i) => `word${String(i)}`).join(" ");
    const results = chunker.chunk(content, { chunkSize: 100, chunkOverlap: 50 });

    expect(results).toHaveLength(2);
    expect(results.every((r) => r.content.split(" ").length <= 100)).toBe(true);
    expect(results[1]?.content.startsWith("word50 ")).toBe(true);
  });
});

describe("createChunker factory", () => {
  it("creates chunkers by unit", () => {
    expect(createChunker("char").unit).toBe("char");
    expect(createChunker("word").unit).toBe("word");
  });
});

describe("fingerprinting", () => {
  const document: CanonicalDocument = {
    source: "confluence",
    externalId: "42",
    title: "Runbook",
    body: "ABCDEFGHIJ",
    metadata: { author: "Dana", url: "https://wiki.example.test/pages/42" },
    updatedAt: "2024-05-01T10:00:00.000Z",
  };

  it("hashes text with md5", () => {
    expect(fingerprint("")).toBe("d41d8cd98f00b204e9800998ecf8427e");
    expect(fingerprint("abc")).toBe("900150983cd24fb0d6963f7d28e17f72");
  });

  it("derives chunk ids from source, external id and index", () => {
    expect(chunkId("jira", "10001", 3)).toBe("jira-10001-chunk-3");
  });

  it("builds chunks that inherit the document metadata", () => {
    const chunks = chunkDocument(document, new CharChunker(), { chunkSize: 4, chunkOverlap: 2 });

    expect(chunks.map((c) => c.chunkId)).toEqual([
      "confluence-42-chunk-0",
      "confluence-42-chunk-1",
      "confluence-42-chunk-2",
      "confluence-42-chunk-3",
    ]);
    expect(chunks[0]).toEqual({
      chunkId: "confluence-42-chunk-0",
      text: "ABCD",
      contentHash: fingerprint("ABCD"),
      metadata: {
        author: "Dana",
        url: "https://wiki.example.test/pages/42",
        source: "confluence",
        documentId: "confluence-42",
        title: "Runbook",
        chunkIndex: 0,
      },
    });
  });

  it("yields identical (chunkId, contentHash) pairs when re-chunked", () => {
    const window = { chunkSize: 4, chunkOverlap: 2 };
    const pairs = () =>
      chunkDocument(document, new CharChunker(), window).map((c) => [c.chunkId, c.contentHash]);

    expect(pairs()).toEqual(pairs());
  });

  it("changes only the hashes of windows whose text changed", () => {
    const window = { chunkSize: 4, chunkOverlap: 2 };
    const before = chunkDocument(document, new CharChunker(), window);
    const after = chunkDocument({ ...document, body: "ABCDEFGHIX" }, new CharChunker(), window);

    const changed = before
      .map((chunk, i) => chunk.contentHash !== after[i]?.contentHash)
      .map((differs, i) => (differs ? i : -1))
      .filter((i) => i >= 0);
    expect(changed).toEqual([3]);
  });

  it("produces no chunks for an empty body", () => {
    expect(
      chunkDocument({ ...document, body: "" }, new CharChunker(), { chunkSize: 4, chunkOverlap: 2 }),
    ).toEqual([]);
  });
});
