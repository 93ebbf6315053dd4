import { z } from "zod";
import { EmbeddingError, GenerationError, describeError } from "../../domain/errors.js";
import { withTimeout } from "../../utils/abort.js";
import { readJson } from "../../utils/http.js";
import { ChatModel, ChatRequest, EmbeddingClient, FetchFn } from "./types.js";

/**
 * Options for any OpenAI-compatible endpoint. Groq is reached through the
 * same client with its own base URL and key.
 */
interface OpenAiClientOptions {
  apiKey: string | null;
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  embeddingTimeoutMs: number;
  chatTimeoutMs: number;
  fetch?: FetchFn;
}

const embeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        embedding: z.array(z.number()),
        index: z.number().int(),
      }),
    )
    .min(1),
});

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
});

export class OpenAiClient implements EmbeddingClient, ChatModel {
  private readonly fetchImpl: FetchFn;

  constructor(private readonly options: OpenAiClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  get embeddingModel(): string {
    return this.options.embeddingModel;
  }

  get chatModel(): string {
    return this.options.chatModel;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const apiKey = this.requireApiKey((message) => new EmbeddingError(message));

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.options.baseUrl}/embeddings`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.options.embeddingModel,
          input: [text],
        }),
        signal: withTimeout(this.options.embeddingTimeoutMs, signal),
      });
    } catch (error) {
      throw new EmbeddingError(`Embeddings request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new EmbeddingError(
        `Embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const parsed = embeddingResponseSchema.safeParse(await readJson(response));
    if (!parsed.success) {
      throw new EmbeddingError("Embeddings endpoint returned a malformed response.");
    }

    const [first] = [...parsed.data.data].sort((a, b) => a.index - b.index);
    if (first.embedding.length === 0) {
      throw new EmbeddingError("Embeddings endpoint returned an empty vector.");
    }
    return first.embedding;
  }

  async complete(request: ChatRequest): Promise<string> {
    const apiKey = this.requireApiKey((message) => new GenerationError(message));
    const messages = [
      ...(request.system ? [{ role: "system", content: request.system }] : []),
      { role: "user", content: request.prompt },
    ];

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.options.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          model: this.options.chatModel,
          temperature: request.temperature,
          messages,
        }),
        signal: withTimeout(this.options.chatTimeoutMs, request.signal),
      });
    } catch (error) {
      throw new GenerationError(`Chat request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new GenerationError(
        `Chat completion failed (${response.status}): ${await response.text()}`,
      );
    }

    const parsed = chatResponseSchema.safeParse(await readJson(response));
    const content = parsed.success ? parsed.data.choices[0].message.content?.trim() ?? "" : "";
    if (!content) {
      throw new GenerationError("Chat completion returned an empty or malformed message.");
    }
    return content;
  }

  private requireApiKey(toError: (message: string) => Error): string {
    if (!this.options.apiKey) {
      throw toError(`An API key is required to call ${this.options.baseUrl}.`);
    }
    return this.options.apiKey;
  }
}
