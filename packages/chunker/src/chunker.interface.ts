import type { ChunkResult, ChunkUnit } from "@collabrag/types";

export interface ChunkWindow {
  /** Maximum units (characters or words) per chunk. */
  chunkSize: number;
  /** Units shared by consecutive chunks; must be smaller than chunkSize. */
  chunkOverlap: number;
}

export interface IChunker {
  readonly unit: ChunkUnit;
  chunk(content: string, window: ChunkWindow): ChunkResult[];
}
