import type { AppConfig } from "@collabrag/types";
import type { Logger } from "@collabrag/logger";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { ResilientEmbeddingProvider } from "./resilient-provider.js";

/** Cohere provider bounded by EMBED_TIMEOUT_MS and a circuit breaker. */
export function createEmbeddingProvider(
  config: Pick<AppConfig, "cohere" | "embedding">,
  logger?: Logger,
): ResilientEmbeddingProvider {
  const cohere = new CohereEmbeddingProvider({
    apiKey: config.cohere.apiKey,
    model: config.cohere.embedModel,
    dimensions: config.embedding.dimensions,
  });
  return new ResilientEmbeddingProvider(cohere, { timeoutMs: config.embedding.timeoutMs, logger });
}
