import type { IndexEntry, ScoredChunk } from "@collabrag/types";

/** An index entry as read back for change detection; vectors are not returned. */
export type StoredChunk = Omit<IndexEntry, "vector">;

export interface IndexStats {
  count: number;
}

/**
 * Vector index keyed by chunkId. Entries are overwritten in place and never
 * deleted by the pipeline. Implementations throw IndexWriteError when the
 * index cannot be read or written.
 */
export interface IVectorStore {
  get(chunkId: string): Promise<StoredChunk | undefined>;
  upsert(entries: IndexEntry[]): Promise<void>;
  /** Up to `k` nearest entries, best first. */
  query(vector: number[], k: number): Promise<ScoredChunk[]>;
  stats(): Promise<IndexStats>;
  ensureCollection(dimensions: number): Promise<void>;
  healthCheck(): Promise<boolean>;
}
