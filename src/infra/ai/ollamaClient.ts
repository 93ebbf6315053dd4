import { z } from "zod";
import { EmbeddingError, GenerationError, describeError } from "../../domain/errors.js";
import { withTimeout } from "../../utils/abort.js";
import { readJson } from "../../utils/http.js";
import { ChatModel, ChatRequest, EmbeddingClient, FetchFn } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  embeddingTimeoutMs: number;
  chatTimeoutMs: number;
  fetch?: FetchFn;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

const chatResponseSchema = z.object({
  message: z.object({
    content: z.string(),
  }),
});

export class OllamaClient implements EmbeddingClient, ChatModel {
  private readonly fetchImpl: FetchFn;

  constructor(private readonly options: OllamaClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  get embeddingModel(): string {
    return this.options.embeddingModel;
  }

  get chatModel(): string {
    return this.options.chatModel;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.options.baseUrl}/api/embeddings`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.options.embeddingModel,
          prompt: text,
        }),
        signal: withTimeout(this.options.embeddingTimeoutMs, signal),
      });
    } catch (error) {
      throw new EmbeddingError(`Ollama embeddings request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new EmbeddingError(
        `Ollama embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const parsed = embeddingsResponseSchema.safeParse(await readJson(response));
    if (!parsed.success) {
      throw new EmbeddingError("Ollama embeddings returned an empty or malformed vector.");
    }
    return parsed.data.embedding;
  }

  async complete(request: ChatRequest): Promise<string> {
    const messages = [
      ...(request.system ? [{ role: "system", content: request.system }] : []),
      { role: "user", content: request.prompt },
    ];

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.options.baseUrl}/api/chat`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.options.chatModel,
          stream: false,
          keep_alive: "30m",
          options: {
            temperature: request.temperature,
          },
          messages,
        }),
        signal: withTimeout(this.options.chatTimeoutMs, request.signal),
      });
    } catch (error) {
      throw new GenerationError(`Ollama chat request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new GenerationError(
        `Ollama chat failed (${response.status}): ${await response.text()}`,
      );
    }

    const parsed = chatResponseSchema.safeParse(await readJson(response));
    const content = parsed.success ? parsed.data.message.content.trim() : "";
    if (!content) {
      throw new GenerationError("Ollama chat returned an empty or malformed message.");
    }
    return content;
  }
}
