import { raceAbort } from "../../utils/abort.js";
import { EmbeddingClient } from "./types.js";

/**
 * Memoises embeddings by exact text. Relies on the embedding model being
 * deterministic; entries are evicted oldest-first past `maxEntries`.
 *
 * Concurrent callers share one request, started without any caller's signal.
 * Each caller's signal only abandons its own wait; the inner client's timeout
 * still bounds the shared request.
 */
export class CachedEmbeddingClient implements EmbeddingClient {
  private readonly cache = new Map<string, Promise<number[]>>();

  constructor(
    private readonly inner: EmbeddingClient,
    private readonly maxEntries: number,
  ) {}

  get embeddingModel(): string {
    return this.inner.embeddingModel;
  }

  get size(): number {
    return this.cache.size;
  }

  embed(text: string, signal?: AbortSignal): Promise<number[]> {
    if (this.maxEntries <= 0) {
      return this.inner.embed(text, signal);
    }

    const cached = this.cache.get(text);
    if (cached) {
      this.cache.delete(text);
      this.cache.set(text, cached);
      return raceAbort(cached, signal).then((vector) => [...vector]);
    }

    const pending = this.inner.embed(text);
    this.cache.set(text, pending);
    this.evictOverflow();

    // Failed lookups are not remembered; the caller still sees the rejection.
    pending.catch(() => {
      if (this.cache.get(text) === pending) {
        this.cache.delete(text);
      }
    });
    return raceAbort(pending, signal).then((vector) => [...vector]);
  }

  private evictOverflow(): void {
    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) {
        return;
      }
      this.cache.delete(oldest.value);
    }
  }
}
