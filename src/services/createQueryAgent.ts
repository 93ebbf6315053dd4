import { AppConfig } from "../config/env.js";
import { DefaultAiClient } from "../infra/ai/defaultAiClient.js";
import { CachedEmbeddingClient } from "../infra/ai/embeddingCache.js";
import { FetchFn } from "../infra/ai/types.js";
import { WttrClient } from "../infra/weather/wttrClient.js";
import { Logger } from "../utils/logger.js";
import { QueryAgent, agentSettingsFromConfig } from "./queryAgent.js";

export function createQueryAgent(
  config: AppConfig,
  logger: Logger,
  options: { fetch?: FetchFn } = {},
): QueryAgent {
  const aiClient = new DefaultAiClient(config, { fetch: options.fetch });
  logger.info("AI providers selected", {
    embeddings: `${aiClient.embeddingProvider}:${aiClient.embeddingModel}`,
    chat: `${aiClient.chatProvider}:${aiClient.chatModel}`,
  });

  return new QueryAgent({
    embedder: aiClient,
    queryEmbedder: new CachedEmbeddingClient(aiClient, config.embeddingCacheSize),
    chatModel: aiClient,
    weather: new WttrClient({
      baseUrl: config.weatherBaseUrl,
      userAgent: config.weatherUserAgent,
      timeoutMs: config.weatherTimeoutMs,
      fetch: options.fetch,
    }),
    settings: agentSettingsFromConfig(config),
    logger,
  });
}
