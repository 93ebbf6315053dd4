import { describe, expect, it, vi } from "vitest";
import { loadConfig } from "../src/config/env.js";
import { DefaultAiClient } from "../src/infra/ai/defaultAiClient.js";
import { FetchFn } from "../src/infra/ai/types.js";
import { QueryAgent, agentSettingsFromConfig } from "../src/services/queryAgent.js";
import { RecordingChatModel, createWeatherLookup, jsonResponse } from "./support/fakes.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ GROQ_API_KEY: "test-secret" });

    expect(config).toMatchObject({
      embeddingProvider: "ollama",
      chatProvider: "groq",
      groqApiKey: "test-secret",
      groqChatModel: "llama-3.1-8b-instant",
      ollamaEmbeddingModel: "all-minilm",
      vectorDimension: 384,
      chunkSize: 1000,
      chunkOverlap: 200,
      retrievalTopK: 3,
      answerTemperature: 0.2,
      weatherBaseUrl: "https://wttr.in",
      weatherTimeoutMs: 15_000,
      weatherAnswerMode: "template",
      defaultWeatherPlace: null,
      corpusPath: null,
      transport: "stdio",
    });
  });

  it("parses numbers and trims trailing slashes", () => {
    const config = loadConfig({
      CHAT_PROVIDER: "ollama",
      OLLAMA_BASE_URL: "http://localhost:11434/",
      CHUNK_SIZE: "500",
      CHUNK_OVERLAP: "50",
      RETRIEVAL_TOP_K: "5",
      DEFAULT_WEATHER_PLACE: " Leeds ",
      GROQ_API_KEY: "",
    });

    expect(config.ollamaBaseUrl).toBe("http://localhost:11434");
    expect(config.chunkSize).toBe(500);
    expect(config.chunkOverlap).toBe(50);
    expect(config.retrievalTopK).toBe(5);
    expect(config.defaultWeatherPlace).toBe("Leeds");
    expect(config.groqApiKey).toBeNull();
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() =>
      loadConfig({ GROQ_API_KEY: "test-secret", CHUNK_SIZE: "500", CHUNK_OVERLAP: "500" }),
    ).toThrow("CHUNK_OVERLAP (500) must be smaller than CHUNK_SIZE (500).");
  });

  it("requires the key of the selected chat provider", () => {
    expect(() => loadConfig({})).toThrow("CHAT_PROVIDER=groq requires GROQ_API_KEY.");
    expect(() => loadConfig({ CHAT_PROVIDER: "openai" })).toThrow(
      "OpenAI chat or embeddings require OPENAI_API_KEY.",
    );
  });

  it("rejects values that are not numbers", () => {
    expect(() => loadConfig({ GROQ_API_KEY: "test-secret", CHUNK_SIZE: "large" })).toThrow();
  });

  it("sizes the index for the selected embedding provider", () => {
    const openai = loadConfig({
      EMBEDDING_PROVIDER: "openai",
      OPENAI_API_KEY: "test-secret",
      CHAT_PROVIDER: "openai",
    });
    const pinned = loadConfig({ GROQ_API_KEY: "test-secret", VECTOR_DIMENSION: "768" });

    expect(openai.vectorDimension).toBe(1536);
    expect(pinned.vectorDimension).toBe(768);
  });

  it("indexes with the default OpenAI embedding model", async () => {
    const config = loadConfig({
      EMBEDDING_PROVIDER: "openai",
      OPENAI_API_KEY: "test-secret",
      CHAT_PROVIDER: "openai",
    });
    const fetchMock = vi.fn<FetchFn>(async () =>
      jsonResponse({ data: [{ index: 0, embedding: new Array<number>(1536).fill(0.01) }] }),
    );
    const agent = new QueryAgent({
      embedder: new DefaultAiClient(config, { fetch: fetchMock }),
      chatModel: new RecordingChatModel(async () => "unused"),
      weather: createWeatherLookup(),
      settings: agentSettingsFromConfig(config),
    });

    const summary = agent.indexDocument({ documentId: "profile", text: "We build clinic software." });

    await expect(summary).resolves.toEqual({
      document_id: "profile",
      chunk_count: 1,
      dimension: 1536,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
