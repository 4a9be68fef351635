import { parseEnv } from "@collabrag/config";
import { createLogger } from "@collabrag/logger";
import { errorMessage } from "@collabrag/errors";
import { createChunker } from "@collabrag/chunker";
import { createEmbeddingProvider } from "@collabrag/embeddings";
import { createVectorStore } from "@collabrag/vector-store";
import { loadRecords, readRawRecords } from "@collabrag/core";

/**
 * Ingest NDJSON records from stdin into the index.
 *
 *   npm run load < records.ndjson
 */
async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ service: "collabrag-load", level: config.logLevel });

  const embeddingProvider = createEmbeddingProvider(config, logger);
  const vectorStore = createVectorStore(config);
  await vectorStore.ensureCollection(config.embedding.dimensions);

  const controller = new AbortController();
  process.on("SIGINT", () => controller.abort());

  try {
    const result = await loadRecords(
      readRawRecords(process.stdin),
      {
        chunker: createChunker(config.chunking.unit),
        window: { chunkSize: config.chunking.chunkSize, chunkOverlap: config.chunking.chunkOverlap },
        embeddingProvider,
        vectorStore,
        batchSize: config.embedding.batchSize,
        logger,
      },
      controller.signal,
    );

    process.stdout.write(`${JSON.stringify(result.summary)}\n`);
    if (result.sources.some((source) => source.status !== "completed")) process.exitCode = 1;
  } finally {
    embeddingProvider.shutdown();
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`[load] ${errorMessage(err)}\n`);
  process.exit(1);
});
