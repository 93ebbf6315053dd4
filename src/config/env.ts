import { z } from "zod";

const envSchema = z.object({
  EMBEDDING_PROVIDER: z.enum(["ollama", "openai"]).default("ollama"),
  CHAT_PROVIDER: z.enum(["groq", "openai", "ollama"]).default("groq"),
  GROQ_API_KEY: z.string().optional(),
  GROQ_BASE_URL: z.string().url().default("https://api.groq.com/openai/v1"),
  GROQ_CHAT_MODEL: z.string().default("llama-3.1-8b-instant"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OLLAMA_BASE_URL: z.string().url().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("llama3.1:8b"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("all-minilm"),
  VECTOR_DIMENSION: z.coerce.number().int().positive().optional(),
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(3),
  ANSWER_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  WEATHER_BASE_URL: z.string().url().default("https://wttr.in"),
  WEATHER_USER_AGENT: z.string().default("weather-doc-agent/0.1 (curl-compatible JSON client)"),
  WEATHER_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  WEATHER_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  WEATHER_ANSWER_MODE: z.enum(["template", "llm"]).default("template"),
  DEFAULT_WEATHER_PLACE: z.string().optional(),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  EMBEDDING_CACHE_SIZE: z.coerce.number().int().nonnegative().default(256),
  CORPUS_PATH: z.string().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
});

export type EmbeddingProvider = "ollama" | "openai";

// Native output sizes of the default embedding models (all-minilm, text-embedding-3-small).
const DEFAULT_VECTOR_DIMENSION: Record<EmbeddingProvider, number> = {
  ollama: 384,
  openai: 1536,
};
export type ChatProvider = "groq" | "openai" | "ollama";

export interface AppConfig {
  embeddingProvider: EmbeddingProvider;
  chatProvider: ChatProvider;
  groqApiKey: string | null;
  groqBaseUrl: string;
  groqChatModel: string;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  openaiChatModel: string;
  openaiEmbeddingModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  vectorDimension: number;
  chunkSize: number;
  chunkOverlap: number;
  retrievalTopK: number;
  answerTemperature: number;
  weatherBaseUrl: string;
  weatherUserAgent: string;
  weatherTimeoutMs: number;
  weatherRetryDelayMs: number;
  weatherAnswerMode: "template" | "llm";
  defaultWeatherPlace: string | null;
  embeddingTimeoutMs: number;
  llmTimeoutMs: number;
  embeddingCacheSize: number;
  corpusPath: string | null;
  logLevel: "debug" | "info" | "warn" | "error";
  transport: "stdio" | "http";
  host: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new Error(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }
  if (parsed.CHAT_PROVIDER === "groq" && !parsed.GROQ_API_KEY) {
    throw new Error("CHAT_PROVIDER=groq requires GROQ_API_KEY.");
  }
  if (
    (parsed.CHAT_PROVIDER === "openai" || parsed.EMBEDDING_PROVIDER === "openai") &&
    !parsed.OPENAI_API_KEY
  ) {
    throw new Error("OpenAI chat or embeddings require OPENAI_API_KEY.");
  }

  return {
    embeddingProvider: parsed.EMBEDDING_PROVIDER,
    chatProvider: parsed.CHAT_PROVIDER,
    groqApiKey: parsed.GROQ_API_KEY || null,
    groqBaseUrl: stripTrailingSlash(parsed.GROQ_BASE_URL),
    groqChatModel: parsed.GROQ_CHAT_MODEL,
    openaiApiKey: parsed.OPENAI_API_KEY || null,
    openaiBaseUrl: stripTrailingSlash(parsed.OPENAI_BASE_URL),
    openaiChatModel: parsed.OPENAI_CHAT_MODEL,
    openaiEmbeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    ollamaBaseUrl: stripTrailingSlash(parsed.OLLAMA_BASE_URL),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    vectorDimension: parsed.VECTOR_DIMENSION ?? DEFAULT_VECTOR_DIMENSION[parsed.EMBEDDING_PROVIDER],
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    retrievalTopK: parsed.RETRIEVAL_TOP_K,
    answerTemperature: parsed.ANSWER_TEMPERATURE,
    weatherBaseUrl: stripTrailingSlash(parsed.WEATHER_BASE_URL),
    weatherUserAgent: parsed.WEATHER_USER_AGENT,
    weatherTimeoutMs: parsed.WEATHER_TIMEOUT_MS,
    weatherRetryDelayMs: parsed.WEATHER_RETRY_DELAY_MS,
    weatherAnswerMode: parsed.WEATHER_ANSWER_MODE,
    defaultWeatherPlace: parsed.DEFAULT_WEATHER_PLACE?.trim() || null,
    embeddingTimeoutMs: parsed.EMBEDDING_TIMEOUT_MS,
    llmTimeoutMs: parsed.LLM_TIMEOUT_MS,
    embeddingCacheSize: parsed.EMBEDDING_CACHE_SIZE,
    corpusPath: parsed.CORPUS_PATH?.trim() || null,
    logLevel: parsed.LOG_LEVEL,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
  };
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}
