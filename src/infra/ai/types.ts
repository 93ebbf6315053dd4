export interface EmbeddingClient {
  readonly embeddingModel: string;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface ChatRequest {
  system?: string;
  prompt: string;
  temperature: number;
  signal?: AbortSignal;
}

export interface ChatModel {
  readonly chatModel: string;
  complete(request: ChatRequest): Promise<string>;
}

export type FetchFn = typeof fetch;
