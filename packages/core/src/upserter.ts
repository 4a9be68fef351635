import type { Chunk, IndexEntry, RunSummary } from "@collabrag/types";
import { EmbeddingProviderError } from "@collabrag/errors";
import type { IEmbeddingProvider } from "@collabrag/embeddings";
import type { IVectorStore } from "@collabrag/vector-store";
import type { Logger } from "@collabrag/logger";
import { emptySummary, record } from "./summary.js";

export interface UpserterDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  /** Changed chunks embedded per provider call. */
  batchSize: number;
  logger?: Logger;
}

interface PendingChunk {
  chunk: Chunk;
  outcome: "new" | "updated";
}

/**
 * Writes chunks to the index only when their content changed.
 *
 * - absent from the index: new (embedded and written)
 * - same content hash: skipped (no embedding, no write)
 * - different hash: updated (embedded and overwritten)
 *
 * Changed chunks are embedded in batches. A batch the provider fails on is
 * counted as failed and nothing of it is written; an IndexWriteError from the
 * store propagates to the caller.
 */
export class IncrementalUpserter {
  private readonly pending: PendingChunk[] = [];
  private readonly pendingIds = new Set<string>();
  private readonly tally: RunSummary = emptySummary();

  constructor(private readonly deps: UpserterDependencies) {}

  async add(chunk: Chunk): Promise<void> {
    // A chunk id queued twice is classified against the first write
    if (this.pendingIds.has(chunk.chunkId)) {
      await this.flush();
    }

    const stored = await this.deps.vectorStore.get(chunk.chunkId);
    if (stored?.contentHash === chunk.contentHash) {
      record(this.tally, "skipped");
      return;
    }

    this.pending.push({ chunk, outcome: stored ? "updated" : "new" });
    this.pendingIds.add(chunk.chunkId);

    if (this.pending.length >= this.deps.batchSize) {
      await this.flush();
    }
  }

  /** Embed and write every queued chunk. */
  async flush(): Promise<void> {
    while (this.pending.length > 0) {
      const batch = this.pending.splice(0, this.deps.batchSize);
      for (const { chunk } of batch) this.pendingIds.delete(chunk.chunkId);
      await this.writeBatch(batch);
    }
  }

  summary(): RunSummary {
    return { ...this.tally };
  }

  private async writeBatch(batch: PendingChunk[]): Promise<void> {
    const vectors = await this.embed(batch);
    if (!vectors) {
      record(this.tally, "failed", batch.length);
      return;
    }

    const entries: IndexEntry[] = batch.map(({ chunk }, i) => ({
      chunkId: chunk.chunkId,
      text: chunk.text,
      contentHash: chunk.contentHash,
      vector: vectors[i] ?? [],
      metadata: chunk.metadata,
    }));
    await this.deps.vectorStore.upsert(entries);

    for (const { outcome } of batch) record(this.tally, outcome);
  }

  private async embed(batch: PendingChunk[]): Promise<number[][] | undefined> {
    try {
      const result = await this.deps.embeddingProvider.batchEmbed(batch.map(({ chunk }) => chunk.text));
      if (result.embeddings.length !== batch.length) {
        throw new EmbeddingProviderError(
          `Expected ${String(batch.length)} embeddings, got ${String(result.embeddings.length)}`,
          this.deps.embeddingProvider.name,
        );
      }
      return result.embeddings;
    } catch (error) {
      if (!(error instanceof EmbeddingProviderError)) throw error;
      this.deps.logger?.warn(
        {
          err: error.message,
          provider: error.provider,
          chunkIds: batch.map(({ chunk }) => chunk.chunkId),
        },
        "Embedding batch failed; chunks marked failed",
      );
      return undefined;
    }
  }
}
