import { Chunk } from "../domain/types.js";

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

export interface ChunkingOptions {
  documentId: string;
  chunkSize?: number;
  overlap?: number;
}

/**
 * Sliding-window split. Each chunk after the first starts
 * `chunkSize - overlap` characters after the previous one, so neighbours
 * share exactly `overlap` characters. Offsets index into `text` as given.
 */
export function splitIntoChunks(text: string, options: ChunkingOptions): Chunk[] {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;
  assertChunkConfig(chunkSize, overlap);

  const chunks: Chunk[] = [];
  const stride = chunkSize - overlap;
  let start = 0;

  while (start < text.length) {
    const end = Math.min(start + chunkSize, text.length);
    chunks.push({
      documentId: options.documentId,
      index: chunks.length,
      text: text.slice(start, end),
      start,
      end,
    });

    if (end >= text.length) {
      break;
    }
    start += stride;
  }

  return chunks;
}

export function assertChunkConfig(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer (got ${chunkSize}).`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new RangeError(
      `overlap must be an integer in [0, chunkSize) (got ${overlap} for chunkSize ${chunkSize}).`,
    );
  }
}
