import { IndexBuildError, describeError } from "../domain/errors.js";
import { Chunk, EmbeddingVector } from "../domain/types.js";
import { EmbedFn, VectorIndex } from "../domain/vectorIndex.js";
import { InMemoryVectorIndex } from "../infra/store/inMemoryVectorIndex.js";
import { splitIntoChunks } from "./chunking.js";

const EMBEDDING_CONCURRENCY = 4;

export interface BuildIndexOptions {
  documentId: string;
  chunkSize: number;
  overlap: number;
  /** Expected vector length. Defaults to whatever the first vector has. */
  dimension?: number;
  signal?: AbortSignal;
}

/**
 * Chunks `documentText`, embeds every chunk and returns a sealed index.
 * Any embedding failure aborts the whole build; no partial index escapes.
 */
export async function buildIndex(
  documentText: string,
  options: BuildIndexOptions,
  embed: EmbedFn,
): Promise<VectorIndex> {
  let chunks: Chunk[];
  try {
    chunks = splitIntoChunks(documentText, {
      documentId: options.documentId,
      chunkSize: options.chunkSize,
      overlap: options.overlap,
    });
  } catch (error) {
    throw new IndexBuildError(`Invalid chunking config: ${describeError(error)}`, {
      cause: error,
    });
  }

  // Blank windows carry nothing to retrieve; skipping them is not fatal.
  const embeddable = chunks.filter((chunk) => chunk.text.trim().length > 0);
  const vectors = await embedAll(embeddable, embed, options.signal);

  const index = new InMemoryVectorIndex({ dimension: options.dimension });
  for (let i = 0; i < embeddable.length; i += 1) {
    try {
      index.insert({ vector: vectors[i], chunk: embeddable[i] });
    } catch (error) {
      throw new IndexBuildError(
        `Chunk ${embeddable[i].index} of ${options.documentId} could not be indexed: ${describeError(error)}`,
        { cause: error },
      );
    }
  }
  index.seal();
  return index;
}

async function embedAll(
  chunks: Chunk[],
  embed: EmbedFn,
  signal?: AbortSignal,
): Promise<EmbeddingVector[]> {
  const vectors: EmbeddingVector[] = new Array(chunks.length);
  const workers = Math.min(EMBEDDING_CONCURRENCY, chunks.length);
  let cursor = 0;
  const state: { failure: IndexBuildError | null } = { failure: null };

  const runWorker = async () => {
    while (state.failure === null) {
      const position = cursor;
      cursor += 1;
      if (position >= chunks.length) {
        return;
      }

      const chunk = chunks[position];
      try {
        vectors[position] = await embed(chunk.text, signal);
      } catch (error) {
        state.failure ??= new IndexBuildError(
          `Embedding failed for chunk ${chunk.index} of ${chunk.documentId}: ${describeError(error)}`,
          { cause: error },
        );
        return;
      }
    }
  };

  await Promise.all(Array.from({ length: workers }, () => runWorker()));
  if (state.failure) {
    throw state.failure;
  }
  return vectors;
}
