import { VectorIndex } from "../../domain/vectorIndex.js";
import { InMemoryVectorIndex } from "./inMemoryVectorIndex.js";

export type IndexState =
  | { status: "empty"; index: VectorIndex }
  | { status: "ready"; index: VectorIndex; documentId: string; builtAt: string }
  | { status: "failed"; index: VectorIndex; error: Error; failedAt: string };

/**
 * Owns the index visible to new queries. A rebuild runs against a fresh
 * index and replaces the reference only once it succeeds, so queries that
 * already took a snapshot keep reading the old one.
 */
export class IndexHolder {
  private state: IndexState;

  private rebuildChain: Promise<unknown> = Promise.resolve();

  constructor(initial?: VectorIndex) {
    const index = initial ?? emptyIndex();
    this.state = { status: "empty", index };
  }

  current(): IndexState {
    return this.state;
  }

  /**
   * Rebuilds are serialised. On failure the previous index stays visible
   * unless nothing was ever built, in which case the holder records the
   * failure so callers can tell "not built" from "build failed".
   */
  rebuild(documentId: string, build: () => Promise<VectorIndex>): Promise<VectorIndex> {
    const task = async () => {
      try {
        const index = await build();
        this.state = {
          status: "ready",
          index,
          documentId,
          builtAt: new Date().toISOString(),
        };
        return index;
      } catch (error) {
        if (this.state.status !== "ready") {
          this.state = {
            status: "failed",
            index: emptyIndex(),
            error: error instanceof Error ? error : new Error(String(error)),
            failedAt: new Date().toISOString(),
          };
        }
        throw error;
      }
    };

    const next = this.rebuildChain.then(task, task);
    this.rebuildChain = next.catch(() => undefined);
    return next;
  }
}

function emptyIndex(): VectorIndex {
  const index = new InMemoryVectorIndex();
  index.seal();
  return index;
}
