import type { AppConfig, IConnector, JobResult, SourceType, SyncJobData } from "@collabrag/types";
import { configuredSources, createConnector } from "@collabrag/connectors";
import { runIngestion } from "@collabrag/core";
import type { IChunker } from "@collabrag/chunker";
import type { IEmbeddingProvider } from "@collabrag/embeddings";
import type { IVectorStore } from "@collabrag/vector-store";
import type { Logger } from "@collabrag/logger";

export interface SyncDependencies {
  config: AppConfig;
  chunker: IChunker;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  logger: Logger;
  /** Defaults to building connectors from `config`. */
  connectorFor?: (source: SourceType) => IConnector;
}

/**
 * Source sync processor.
 *
 * Runs one ingestion pass over the requested sources (every configured source
 * when the job names none). Fatal run errors are rethrown so the queue can
 * retry the job; per-source failures are reported in the result.
 */
export async function processSync(
  data: SyncJobData,
  deps: SyncDependencies,
  signal?: AbortSignal,
): Promise<JobResult> {
  const { config, logger } = deps;
  const sources = data.sources ?? configuredSources(config);

  logger.info({ sources, reason: data.reason }, "Sync started");

  const result = await runIngestion({
    sources,
    connectorFor:
      deps.connectorFor ?? ((source) => createConnector(source, config, { logger })),
    deps: {
      chunker: deps.chunker,
      window: { chunkSize: config.chunking.chunkSize, chunkOverlap: config.chunking.chunkOverlap },
      embeddingProvider: deps.embeddingProvider,
      vectorStore: deps.vectorStore,
      batchSize: config.embedding.batchSize,
      logger,
    },
    signal,
  });

  const failures = result.sources
    .filter((source) => source.status !== "completed")
    .map((source) => `${source.source}: ${source.error ?? source.status}`);

  logger.info(
    {
      summary: result.summary,
      sources: result.sources.map(({ source, status, documents }) => ({ source, status, documents })),
      durationMs: result.durationMs,
    },
    "Sync finished",
  );

  return {
    success: failures.length === 0,
    processedAt: new Date(),
    duration: result.durationMs,
    metrics: result.summary,
    ...(failures.length > 0 ? { error: failures.join("; ") } : {}),
  };
}
