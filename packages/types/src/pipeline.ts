import type { Chunk } from "./chunk.js";
import type { SourceType } from "./document.js";

export type UpsertOutcome = "new" | "updated" | "skipped" | "failed";

export interface RunSummary {
  new: number;
  updated: number;
  skipped: number;
  failed: number;
}

export type SourceStatus = "completed" | "aborted" | "cancelled";

export interface SourceRunResult {
  source: SourceType;
  status: SourceStatus;
  summary: RunSummary;
  documents: number;
  malformedRecords: number;
  error?: string;
}

export interface IngestionRunResult {
  summary: RunSummary;
  sources: SourceRunResult[];
  durationMs: number;
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export type TargetModel = "claude" | "gpt" | "gemini" | "generic";

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

export interface AnswerContext {
  chunks: ScoredChunk[];
  assembledPrompt: string;
}
