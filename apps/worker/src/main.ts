import { Worker } from "bullmq";
import type { SyncJobData } from "@collabrag/types";
import { parseEnv } from "@collabrag/config";
import { createLogger } from "@collabrag/logger";
import { errorMessage } from "@collabrag/errors";
import { createChunker } from "@collabrag/chunker";
import { createEmbeddingProvider } from "@collabrag/embeddings";
import { createVectorStore } from "@collabrag/vector-store";
import {
  QUEUE_NAMES,
  createSyncQueue,
  parseRedisConnection,
  scheduleSync,
} from "@collabrag/queue";
import { processSync } from "./processors/sync.js";

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ service: "collabrag-worker", level: config.logLevel });

  const embeddingProvider = createEmbeddingProvider(config, logger);
  const vectorStore = createVectorStore(config);
  await vectorStore.ensureCollection(config.embedding.dimensions);
  const chunker = createChunker(config.chunking.unit);

  const connection = parseRedisConnection(config.redis.url);
  const syncQueue = createSyncQueue({ connection });
  await scheduleSync(syncQueue, config.redis.syncCron);

  const shutdownController = new AbortController();

  const syncWorker = new Worker<SyncJobData>(
    QUEUE_NAMES.SYNC,
    async (job) =>
      processSync(
        job.data,
        {
          config,
          chunker,
          embeddingProvider,
          vectorStore,
          logger: logger.child({ jobId: job.id }),
        },
        shutdownController.signal,
      ),
    // Runs never overlap; each owns the index while it writes
    { connection, concurrency: 1 },
  );

  syncWorker.on("failed", (job, err) => {
    logger.error({ jobId: job?.id, err: err.message }, "Sync job failed");
  });

  logger.info(
    { queue: QUEUE_NAMES.SYNC, cron: config.redis.syncCron, collection: config.collectionName },
    "Worker started",
  );

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down...");
    shutdownController.abort();
    await syncWorker.close();
    await syncQueue.close();
    embeddingProvider.shutdown();
    logger.info("Worker closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err: unknown) => {
  process.stderr.write(`[worker] Fatal error: ${errorMessage(err)}\n`);
  process.exit(1);
});
