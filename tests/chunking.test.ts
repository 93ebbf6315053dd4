import { describe, expect, it } from "vitest";
import { splitIntoChunks } from "../src/pipelines/chunking.js";

describe("chunking pipeline", () => {
  it("slides a fixed window with the configured overlap", () => {
    const chunks = splitIntoChunks("abcdefghij", { documentId: "doc", chunkSize: 4, overlap: 1 });

    expect(chunks).toEqual([
      { documentId: "doc", index: 0, text: "abcd", start: 0, end: 4 },
      { documentId: "doc", index: 1, text: "defg", start: 3, end: 7 },
      { documentId: "doc", index: 2, text: "ghij", start: 6, end: 10 },
    ]);
  });

  it("shares exactly the overlap between neighbours at default settings", () => {
    const text = Array.from({ length: 2500 }, (_, i) => String.fromCharCode(97 + (i % 26))).join("");
    const chunks = splitIntoChunks(text, { documentId: "doc" });

    expect(chunks.map((chunk) => [chunk.start, chunk.end])).toEqual([
      [0, 1000],
      [800, 1800],
      [1600, 2500],
    ]);
    for (let i = 1; i < chunks.length; i += 1) {
      expect(chunks[i - 1].text.slice(-200)).toBe(chunks[i].text.slice(0, 200));
    }
    for (const chunk of chunks) {
      expect(chunk.text).toBe(text.slice(chunk.start, chunk.end));
    }
  });

  it("is deterministic", () => {
    const text = "Northwind builds staffing tools for clinics. ".repeat(40);
    const first = splitIntoChunks(text, { documentId: "doc", chunkSize: 100, overlap: 30 });
    const second = splitIntoChunks(text, { documentId: "doc", chunkSize: 100, overlap: 30 });

    expect(second).toEqual(first);
  });

  it("returns one chunk for short text and none for empty text", () => {
    expect(splitIntoChunks("short", { documentId: "doc" })).toEqual([
      { documentId: "doc", index: 0, text: "short", start: 0, end: 5 },
    ]);
    expect(splitIntoChunks("", { documentId: "doc" })).toEqual([]);
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => splitIntoChunks("abc", { documentId: "doc", chunkSize: 10, overlap: 10 })).toThrow(
      RangeError,
    );
  });
});
