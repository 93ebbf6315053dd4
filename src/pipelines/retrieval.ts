import { RetrievalError, describeError } from "../domain/errors.js";
import { Query, RetrievalResult } from "../domain/types.js";
import { EmbedFn, VectorIndex } from "../domain/vectorIndex.js";

export const DEFAULT_TOP_K = 3;

export async function retrieve(
  query: Query,
  embed: EmbedFn,
  index: VectorIndex,
  k: number = DEFAULT_TOP_K,
  signal?: AbortSignal,
): Promise<RetrievalResult> {
  let queryVector: number[];
  try {
    queryVector = await embed(query.text, signal);
  } catch (error) {
    throw new RetrievalError(`Query embedding failed: ${describeError(error)}`, {
      cause: error,
    });
  }

  try {
    return index.search(queryVector, k);
  } catch (error) {
    throw new RetrievalError(`Vector search failed: ${describeError(error)}`, {
      cause: error,
    });
  }
}
