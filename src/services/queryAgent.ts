import path from "node:path";
import { AppConfig } from "../config/env.js";
import {
  GenerationError,
  IndexBuildError,
  NetworkError,
  NotFoundError,
  RetrievalError,
  ValidationError,
  describeError,
} from "../domain/errors.js";
import {
  Answer,
  DocumentRouteReason,
  Query,
  RetrievalResult,
  WeatherReport,
  createQuery,
  elapsedSince,
} from "../domain/types.js";
import { EmbedFn } from "../domain/vectorIndex.js";
import { WeatherLookup } from "../domain/weatherLookup.js";
import { ChatModel, EmbeddingClient } from "../infra/ai/types.js";
import {
  isSupportedDocumentExtension,
  getSupportedDocumentExtensions,
  loadDocumentText,
} from "../infra/parsers/documentLoader.js";
import { IndexHolder } from "../infra/store/indexHolder.js";
import { formatWeatherReport, synthesize } from "../pipelines/answering.js";
import { buildIndex } from "../pipelines/indexing.js";
import { retrieve } from "../pipelines/retrieval.js";
import { route } from "../pipelines/routing.js";
import { Logger, NullLogger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";

export interface AgentSettings {
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  answerTemperature: number;
  vectorDimension: number | null;
  weatherTimeoutMs: number;
  weatherRetryDelayMs: number;
  weatherAnswerMode: "template" | "llm";
  defaultWeatherPlace: string | null;
}

export interface QueryAgentDeps {
  /** Used for chunk embeddings at index time. */
  embedder: EmbeddingClient;
  /** Used for query embeddings. Must wrap the same model as `embedder`. */
  queryEmbedder?: EmbeddingClient;
  chatModel: ChatModel;
  weather: WeatherLookup;
  settings: AgentSettings;
  indexHolder?: IndexHolder;
  logger?: Logger;
}

export interface IndexSummary {
  document_id: string;
  chunk_count: number;
  dimension: number | null;
}

export interface IndexStatus {
  status: "empty" | "ready" | "failed";
  document_id: string | null;
  chunk_count: number;
  dimension: number | null;
  updated_at: string | null;
  error: string | null;
}

export interface HandleQueryOptions {
  signal?: AbortSignal;
}

export function agentSettingsFromConfig(config: AppConfig): AgentSettings {
  return {
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    topK: config.retrievalTopK,
    answerTemperature: config.answerTemperature,
    vectorDimension: config.vectorDimension,
    weatherTimeoutMs: config.weatherTimeoutMs,
    weatherRetryDelayMs: config.weatherRetryDelayMs,
    weatherAnswerMode: config.weatherAnswerMode,
    defaultWeatherPlace: config.defaultWeatherPlace,
  };
}

export class QueryAgent {
  private readonly indexHolder: IndexHolder;

  private readonly logger: Logger;

  private readonly embedChunk: EmbedFn;

  private readonly embedQuery: EmbedFn;

  constructor(private readonly deps: QueryAgentDeps) {
    this.indexHolder = deps.indexHolder ?? new IndexHolder();
    this.logger = deps.logger ?? new NullLogger();

    const queryEmbedder = deps.queryEmbedder ?? deps.embedder;
    this.embedChunk = (text, signal) => deps.embedder.embed(text, signal);
    this.embedQuery = (text, signal) => queryEmbedder.embed(text, signal);
  }

  /**
   * Single entry point for front ends. Stage failures come back as typed
   * answers; only a blank query throws.
   */
  async handleQuery(text: string, options: HandleQueryOptions = {}): Promise<Answer> {
    if (!text.trim()) {
      throw new ValidationError("Query text must not be empty.");
    }

    const query = createQuery(text.trim());
    const decision = route(query, { defaultPlace: this.deps.settings.defaultWeatherPlace });
    this.logger.debug("Routed query", {
      route: decision.route,
      reason: decision.route === "document_qa" ? decision.reason : undefined,
      weatherCues: decision.signals.weatherCues,
      documentCues: decision.signals.documentCues,
    });

    switch (decision.route) {
      case "weather":
        return this.answerWeather(query, decision.place, options.signal);
      case "document_qa":
        return this.answerFromDocuments(query, decision.reason, options.signal);
      default: {
        const unreachable: never = decision;
        throw new Error(`Unhandled route: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /** Looks up weather, retrying a transient failure once. */
  async lookupWeather(place: string, signal?: AbortSignal): Promise<WeatherReport> {
    const { weatherTimeoutMs, weatherRetryDelayMs } = this.deps.settings;
    return withRetry(
      () => this.deps.weather.lookup(place, { timeoutMs: weatherTimeoutMs, signal }),
      {
        maxAttempts: 2,
        initialDelayMs: weatherRetryDelayMs,
        retryOn: [NetworkError],
        signal,
        onRetry: (attempt, error, delayMs) => {
          this.logger.warn("Weather lookup failed; retrying", {
            place,
            attempt,
            delayMs,
            error: error.message,
          });
        },
      },
    );
  }

  async searchChunks(text: string, topK?: number, signal?: AbortSignal): Promise<RetrievalResult> {
    if (!text.trim()) {
      throw new ValidationError("Search text must not be empty.");
    }

    const snapshot = this.indexHolder.current();
    if (snapshot.index.size === 0) {
      return [];
    }
    return retrieve(
      createQuery(text.trim()),
      this.embedQuery,
      snapshot.index,
      topK ?? this.deps.settings.topK,
      signal,
    );
  }

  async indexDocument(input: { documentId: string; text: string }): Promise<IndexSummary> {
    const { chunkSize, chunkOverlap, vectorDimension } = this.deps.settings;
    const startedAt = Date.now();

    try {
      const index = await this.indexHolder.rebuild(input.documentId, () =>
        buildIndex(
          input.text,
          {
            documentId: input.documentId,
            chunkSize,
            overlap: chunkOverlap,
            dimension: vectorDimension ?? undefined,
          },
          this.embedChunk,
        ),
      );

      this.logger.info("Index built", {
        documentId: input.documentId,
        chunks: index.size,
        elapsedMs: Date.now() - startedAt,
      });
      return {
        document_id: input.documentId,
        chunk_count: index.size,
        dimension: index.dimension,
      };
    } catch (error) {
      this.logger.error("Index build failed", {
        documentId: input.documentId,
        error: describeError(error),
      });
      throw error;
    }
  }

  async indexDocumentFile(filePath: string): Promise<IndexSummary> {
    const absolutePath = path.resolve(filePath);
    if (!isSupportedDocumentExtension(absolutePath)) {
      throw new IndexBuildError(
        `Unsupported extension: ${path.extname(absolutePath) || "(none)"}. Allowed: ${getSupportedDocumentExtensions().join(", ")}`,
      );
    }

    let text: string;
    try {
      text = await loadDocumentText(absolutePath);
    } catch (error) {
      throw new IndexBuildError(`Could not read ${absolutePath}: ${describeError(error)}`, {
        cause: error,
      });
    }
    if (!text.trim()) {
      throw new IndexBuildError(`${absolutePath} contains no extractable text.`);
    }

    return this.indexDocument({ documentId: path.basename(absolutePath), text });
  }

  getStatus(): IndexStatus {
    const state = this.indexHolder.current();
    switch (state.status) {
      case "ready":
        return {
          status: "ready",
          document_id: state.documentId,
          chunk_count: state.index.size,
          dimension: state.index.dimension,
          updated_at: state.builtAt,
          error: null,
        };
      case "failed":
        return {
          status: "failed",
          document_id: null,
          chunk_count: 0,
          dimension: null,
          updated_at: state.failedAt,
          error: state.error.message,
        };
      case "empty":
        return {
          status: "empty",
          document_id: null,
          chunk_count: 0,
          dimension: null,
          updated_at: null,
          error: null,
        };
    }
  }

  private async answerWeather(query: Query, place: string, signal?: AbortSignal): Promise<Answer> {
    let report: WeatherReport;
    try {
      report = await this.lookupWeather(place, signal);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return {
          provenance: "weather",
          status: "not_found",
          query: query.text,
          place,
          text: `I couldn't find weather data for "${place}". Please check the place name.`,
          error: error.message,
          latencyMs: elapsedSince(query),
        };
      }
      // A cancel during the retry backoff surfaces as the signal's own reason.
      if (error instanceof NetworkError || signal?.aborted) {
        const message = describeError(error);
        this.logger.error("Weather service unavailable", { place, error: message });
        return {
          provenance: "weather",
          status: "unavailable",
          query: query.text,
          place,
          text: "The weather service is unavailable right now. Please try again later.",
          error: message,
          latencyMs: elapsedSince(query),
        };
      }
      throw error;
    }

    if (this.deps.settings.weatherAnswerMode === "llm") {
      try {
        return await synthesize(query, report, {
          chatModel: this.deps.chatModel,
          temperature: this.deps.settings.answerTemperature,
          signal,
        });
      } catch (error) {
        if (!(error instanceof GenerationError)) {
          throw error;
        }
        // The report itself is authoritative; only the phrasing step failed.
        this.logger.warn("Weather phrasing failed; returning the formatted report", {
          error: error.message,
        });
      }
    }

    return {
      provenance: "weather",
      status: "ok",
      query: query.text,
      place: report.place,
      text: formatWeatherReport(report),
      report,
      latencyMs: elapsedSince(query),
    };
  }

  private async answerFromDocuments(
    query: Query,
    reason: DocumentRouteReason,
    signal?: AbortSignal,
  ): Promise<Answer> {
    // Snapshot once; a concurrent rebuild does not affect this query.
    const snapshot = this.indexHolder.current();

    if (snapshot.status === "failed") {
      return {
        provenance: "document_qa",
        status: "index_unavailable",
        query: query.text,
        text: "Document questions are unavailable because the document index could not be built.",
        retrieval: [],
        error: snapshot.error.message,
        latencyMs: elapsedSince(query),
      };
    }

    const { chatModel, settings } = this.deps;
    const synthesisDeps = { chatModel, temperature: settings.answerTemperature, signal };

    if (snapshot.index.size === 0) {
      return synthesize(query, [], synthesisDeps);
    }

    let retrieval: RetrievalResult;
    try {
      retrieval = await retrieve(query, this.embedQuery, snapshot.index, settings.topK, signal);
    } catch (error) {
      if (!(error instanceof RetrievalError)) {
        throw error;
      }
      this.logger.error("Retrieval failed", { reason, error: error.message });
      return {
        provenance: "document_qa",
        status: "retrieval_failed",
        query: query.text,
        text: "I could not search the documents because retrieval failed. Please try again later.",
        retrieval: [],
        error: error.message,
        latencyMs: elapsedSince(query),
      };
    }

    try {
      return await synthesize(query, retrieval, synthesisDeps);
    } catch (error) {
      if (!(error instanceof GenerationError)) {
        throw error;
      }
      this.logger.error("Answer generation failed", { reason, error: error.message });
      return {
        provenance: "document_qa",
        status: "generation_failed",
        query: query.text,
        text: "I found relevant passages but could not generate an answer. Please try again later.",
        retrieval,
        error: error.message,
        latencyMs: elapsedSince(query),
      };
    }
  }
}
