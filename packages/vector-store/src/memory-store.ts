import type { IndexEntry, ScoredChunk } from "@collabrag/types";
import { IndexWriteError } from "@collabrag/errors";
import type { IndexStats, IVectorStore, StoredChunk } from "./vector-store.interface.js";

function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function withoutVector(entry: IndexEntry): StoredChunk {
  return {
    chunkId: entry.chunkId,
    text: entry.text,
    contentHash: entry.contentHash,
    metadata: { ...entry.metadata },
  };
}

/**
 * Process-local index with cosine scoring. Used by tests and local runs
 * without a Qdrant instance.
 */
export class InMemoryVectorStore implements IVectorStore {
  private readonly entries = new Map<string, IndexEntry>();
  private dimensions?: number;

  async get(chunkId: string): Promise<StoredChunk | undefined> {
    const entry = this.entries.get(chunkId);
    return entry ? withoutVector(entry) : undefined;
  }

  async upsert(entries: IndexEntry[]): Promise<void> {
    for (const entry of entries) {
      if (this.dimensions !== undefined && entry.vector.length !== this.dimensions) {
        throw new IndexWriteError(
          `Vector for ${entry.chunkId} has ${String(entry.vector.length)} dimensions, expected ${String(this.dimensions)}`,
        );
      }
    }
    for (const entry of entries) {
      this.entries.set(entry.chunkId, { ...entry, vector: [...entry.vector] });
    }
  }

  async query(vector: number[], k: number): Promise<ScoredChunk[]> {
    return [...this.entries.values()]
      .map((entry) => ({ chunk: withoutVector(entry), score: cosineSimilarity(vector, entry.vector) }))
      .sort((a, b) => b.score - a.score || compareIds(a.chunk.chunkId, b.chunk.chunkId))
      .slice(0, Math.max(0, k));
  }

  async stats(): Promise<IndexStats> {
    return { count: this.entries.size };
  }

  async ensureCollection(dimensions: number): Promise<void> {
    this.dimensions = dimensions;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Stored vector for a chunk, for inspection in tests. */
  vectorOf(chunkId: string): number[] | undefined {
    return this.entries.get(chunkId)?.vector;
  }
}
