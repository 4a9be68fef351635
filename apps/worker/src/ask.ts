import { parseEnv } from "@collabrag/config";
import { createLogger } from "@collabrag/logger";
import { errorMessage } from "@collabrag/errors";
import { createEmbeddingProvider } from "@collabrag/embeddings";
import { createVectorStore } from "@collabrag/vector-store";
import { answerContext } from "@collabrag/core";

/**
 * Print the assembled prompt for a question against the current index.
 *
 *   npm run ask -- "How do I rotate the staging certificates?"
 */
async function main(): Promise<void> {
  const question = process.argv.slice(2).join(" ").trim();
  if (question.length === 0) {
    process.stderr.write("Usage: npm run ask -- <question>\n");
    process.exit(2);
  }

  const config = parseEnv();
  const logger = createLogger({ service: "collabrag-ask", level: config.logLevel });
  const embeddingProvider = createEmbeddingProvider(config, logger);

  try {
    const result = await answerContext(question, config.retrieval.topK, {
      embeddingProvider,
      vectorStore: createVectorStore(config),
      targetModel: config.retrieval.targetModel,
      promptMaxChars: config.retrieval.promptMaxChars,
      logger,
    });

    for (const { chunk, score } of result.chunks) {
      logger.info({ chunkId: chunk.chunkId, score, url: chunk.metadata.url }, "Retrieved chunk");
    }
    process.stdout.write(`${result.assembledPrompt}\n`);
  } finally {
    embeddingProvider.shutdown();
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`[ask] ${errorMessage(err)}\n`);
  process.exit(1);
});
