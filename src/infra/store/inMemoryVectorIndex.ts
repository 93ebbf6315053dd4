import { VectorIndex } from "../../domain/vectorIndex.js";
import { EmbeddingVector, IndexEntry, RetrievalResult } from "../../domain/types.js";
import { cosineSimilarity, isFiniteVector } from "../../utils/vector.js";

interface StoredEntry {
  entry: IndexEntry;
  order: number;
}

/**
 * Exact linear-scan cosine index. Ranking is by descending similarity with
 * ties kept in insertion order.
 */
export class InMemoryVectorIndex implements VectorIndex {
  private readonly stored: StoredEntry[] = [];

  private fixedDimension: number | null;

  private sealed = false;

  constructor(options: { dimension?: number } = {}) {
    this.fixedDimension = options.dimension ?? null;
  }

  get size(): number {
    return this.stored.length;
  }

  get dimension(): number | null {
    return this.fixedDimension;
  }

  insert(entry: IndexEntry): void {
    if (this.sealed) {
      throw new Error("Vector index is sealed; rebuild it to change its contents.");
    }
    if (entry.vector.length === 0 || !isFiniteVector(entry.vector)) {
      throw new Error(`Chunk ${entry.chunk.index} has an empty or non-finite vector.`);
    }
    this.assertDimension(entry.vector);
    this.fixedDimension = entry.vector.length;

    this.stored.push({ entry: copyEntry(entry), order: this.stored.length });
  }

  search(queryVector: EmbeddingVector, k: number): RetrievalResult {
    if (!Number.isInteger(k) || k <= 0) {
      throw new RangeError(`k must be a positive integer (got ${k}).`);
    }
    if (this.stored.length === 0) {
      return [];
    }
    if (!isFiniteVector(queryVector)) {
      throw new Error("Query vector contains non-finite values.");
    }
    this.assertDimension(queryVector);

    const candidates = this.stored.map((item) => ({
      order: item.order,
      chunk: item.entry.chunk,
      score: cosineSimilarity(queryVector, item.entry.vector),
    }));

    return candidates
      .sort((a, b) => b.score - a.score || a.order - b.order)
      .slice(0, k)
      .map(({ chunk, score }) => ({ chunk: { ...chunk }, score }));
  }

  entries(): readonly IndexEntry[] {
    return this.stored.map((item) => copyEntry(item.entry));
  }

  seal(): void {
    this.sealed = true;
  }

  private assertDimension(vector: EmbeddingVector): void {
    if (this.fixedDimension !== null && vector.length !== this.fixedDimension) {
      throw new Error(
        `Vector dimension mismatch: index holds ${this.fixedDimension}, got ${vector.length}.`,
      );
    }
  }
}

function copyEntry(entry: IndexEntry): IndexEntry {
  return { vector: [...entry.vector], chunk: { ...entry.chunk } };
}
