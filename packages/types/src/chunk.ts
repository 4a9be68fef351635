import type { DocumentMetadata, SourceType } from "./document.js";

export type ChunkUnit = "char" | "word";

export interface ChunkingConfig {
  unit: ChunkUnit;
  chunkSize: number;
  chunkOverlap: number;
}

export interface ChunkMetadata extends DocumentMetadata {
  source: SourceType;
  documentId: string;
  title: string;
  chunkIndex: number;
}

export interface Chunk {
  /** `<source>-<externalId>-chunk-<index>` */
  chunkId: string;
  text: string;
  contentHash: string;
  metadata: ChunkMetadata;
}

export interface ChunkResult {
  content: string;
  index: number;
  metadata: {
    start: number;
    end: number;
  };
}

export interface IndexEntry {
  chunkId: string;
  text: string;
  contentHash: string;
  vector: number[];
  metadata: ChunkMetadata;
}
