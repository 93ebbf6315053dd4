import { EmbeddingVector, IndexEntry, RetrievalResult } from "./types.js";

export type EmbedFn = (
  text: string,
  signal?: AbortSignal,
) => Promise<EmbeddingVector>;

export interface VectorIndex {
  readonly size: number;
  readonly dimension: number | null;
  insert(entry: IndexEntry): void;
  search(queryVector: EmbeddingVector, k: number): RetrievalResult;
  entries(): readonly IndexEntry[];
  seal(): void;
}
