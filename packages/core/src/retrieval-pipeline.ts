import type { AnswerContext, ScoredChunk, TargetModel } from "@collabrag/types";
import { ConfigurationError, EmbeddingProviderError } from "@collabrag/errors";
import type { IEmbeddingProvider } from "@collabrag/embeddings";
import type { IVectorStore } from "@collabrag/vector-store";
import type { Logger } from "@collabrag/logger";
import { assemblePrompt } from "./context-assembler.js";

export interface RetrievalDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  targetModel: TargetModel;
  promptMaxChars: number;
  logger?: Logger;
}

/** Descending score; equal scores fall back to ascending chunk id. */
export function rankChunks(chunks: ScoredChunk[]): ScoredChunk[] {
  return [...chunks].sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;
    if (a.chunk.chunkId < b.chunk.chunkId) return -1;
    return a.chunk.chunkId > b.chunk.chunkId ? 1 : 0;
  });
}

/**
 * Retrieval pipeline: Question -> Embed -> Vector Search -> Rank -> Assemble Prompt
 *
 * Returns every ranked chunk; the prompt holds the leading ones that fit.
 */
export async function answerContext(
  question: string,
  k: number,
  deps: RetrievalDependencies,
): Promise<AnswerContext> {
  if (!Number.isInteger(k) || k < 1) {
    throw new ConfigurationError("Invalid retrieval parameters", [
      `k must be a positive integer (got ${String(k)})`,
    ]);
  }

  const startTime = Date.now();

  const embeddingResult = await deps.embeddingProvider.embed(question);
  const queryVector = embeddingResult.embeddings[0];

  if (!queryVector) {
    throw new EmbeddingProviderError(
      "Failed to generate embedding for question",
      deps.embeddingProvider.name,
    );
  }

  const results = await deps.vectorStore.query(queryVector, k);
  const chunks = rankChunks(results).slice(0, k);

  const { prompt, included } = assemblePrompt(question, chunks, {
    targetModel: deps.targetModel,
    maxChars: deps.promptMaxChars,
  });

  deps.logger?.debug(
    {
      retrieved: chunks.length,
      inPrompt: included.length,
      retrievalTimeMs: Date.now() - startTime,
    },
    "Context assembled",
  );

  return { chunks, assembledPrompt: prompt };
}
