import { AppConfig, ChatProvider, EmbeddingProvider } from "../../config/env.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { ChatModel, ChatRequest, EmbeddingClient, FetchFn } from "./types.js";

/**
 * Routes embeddings and chat to the configured providers. Indexing and
 * querying both go through the same embedding client, which keeps the vector
 * space consistent.
 */
export class DefaultAiClient implements EmbeddingClient, ChatModel {
  private readonly embedder: EmbeddingClient;

  private readonly chat: ChatModel;

  readonly embeddingProvider: EmbeddingProvider;

  readonly chatProvider: ChatProvider;

  constructor(config: AppConfig, options: { fetch?: FetchFn } = {}) {
    const ollama = new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
      embeddingTimeoutMs: config.embeddingTimeoutMs,
      chatTimeoutMs: config.llmTimeoutMs,
      fetch: options.fetch,
    });
    const openAi = new OpenAiClient({
      apiKey: config.openaiApiKey,
      baseUrl: config.openaiBaseUrl,
      chatModel: config.openaiChatModel,
      embeddingModel: config.openaiEmbeddingModel,
      embeddingTimeoutMs: config.embeddingTimeoutMs,
      chatTimeoutMs: config.llmTimeoutMs,
      fetch: options.fetch,
    });
    const groq = new OpenAiClient({
      apiKey: config.groqApiKey,
      baseUrl: config.groqBaseUrl,
      chatModel: config.groqChatModel,
      embeddingModel: "",
      embeddingTimeoutMs: config.embeddingTimeoutMs,
      chatTimeoutMs: config.llmTimeoutMs,
      fetch: options.fetch,
    });

    this.embeddingProvider = config.embeddingProvider;
    this.chatProvider = config.chatProvider;
    this.embedder = config.embeddingProvider === "openai" ? openAi : ollama;

    this.chat = { groq, openai: openAi, ollama }[config.chatProvider];
  }

  get embeddingModel(): string {
    return this.embedder.embeddingModel;
  }

  get chatModel(): string {
    return this.chat.chatModel;
  }

  embed(text: string, signal?: AbortSignal): Promise<number[]> {
    return this.embedder.embed(text, signal);
  }

  complete(request: ChatRequest): Promise<string> {
    return this.chat.complete(request);
  }
}
