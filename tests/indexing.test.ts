import { describe, expect, it } from "vitest";
import { IndexBuildError } from "../src/domain/errors.js";
import { buildIndex } from "../src/pipelines/indexing.js";
import { HashEmbedder } from "./support/fakes.js";

describe("buildIndex", () => {
  it("embeds every chunk into a sealed index", async () => {
    const embedder = new HashEmbedder(64);
    const index = await buildIndex(
      "aaaa bbbb cccc",
      { documentId: "doc", chunkSize: 6, overlap: 1 },
      (text) => embedder.embed(text),
    );

    expect(index.size).toBe(3);
    expect(index.dimension).toBe(64);
    expect(index.entries().map((entry) => entry.chunk.text)).toEqual(["aaaa b", "bbbb c", "cccc"]);
    expect(() => index.insert({ vector: new Array(64).fill(1), chunk: index.entries()[0].chunk })).toThrow(
      "sealed",
    );
  });

  it("skips blank windows", async () => {
    const embedder = new HashEmbedder(8);
    const text = `abc${" ".repeat(10)}xyz`;
    const index = await buildIndex(text, { documentId: "doc", chunkSize: 5, overlap: 0 }, (t) =>
      embedder.embed(t),
    );

    expect(index.entries().map((entry) => entry.chunk.index)).toEqual([0, 2, 3]);
    expect(embedder.calls).toHaveLength(3);
  });

  it("fails the whole build when any embedding fails", async () => {
    const embedder = new HashEmbedder(8);
    const build = buildIndex(
      "aaaa bbbb cccc",
      { documentId: "doc", chunkSize: 6, overlap: 1 },
      async (text) => {
        if (text.startsWith("bbbb")) {
          throw new Error("embedding service down");
        }
        return embedder.embed(text);
      },
    );

    await expect(build).rejects.toBeInstanceOf(IndexBuildError);
    await expect(build).rejects.toThrow(
      "Embedding failed for chunk 1 of doc: embedding service down",
    );
  });

  it("rejects vectors of the wrong dimension", async () => {
    const embedder = new HashEmbedder(64);
    await expect(
      buildIndex("hello world", { documentId: "doc", chunkSize: 50, overlap: 0, dimension: 384 }, (t) =>
        embedder.embed(t),
      ),
    ).rejects.toThrow("Chunk 0 of doc could not be indexed");
  });

  it("reports an invalid chunk configuration as a build error", async () => {
    const embedder = new HashEmbedder(8);
    await expect(
      buildIndex("hello", { documentId: "doc", chunkSize: 10, overlap: 10 }, (t) => embedder.embed(t)),
    ).rejects.toBeInstanceOf(IndexBuildError);
  });
});
