/**
 * @collabrag/core
 *
 * Incremental ingestion, NDJSON record boundary and retrieval.
 */

export { IncrementalUpserter } from "./upserter.js";
export type { UpserterDependencies } from "./upserter.js";
export { ingestSource, runIngestion } from "./ingestion-pipeline.js";
export type { IngestionDependencies, IngestionRunOptions } from "./ingestion-pipeline.js";
export { loadRecords } from "./record-loader.js";
export { answerContext, rankChunks } from "./retrieval-pipeline.js";
export type { RetrievalDependencies } from "./retrieval-pipeline.js";
export { assembleContext, assemblePrompt, NO_CONTEXT_MARKER } from "./context-assembler.js";
export type { AssembledPrompt, PromptOptions } from "./context-assembler.js";
export { serializeRawRecord, parseRawRecordLine, readRawRecords, writeRawRecords } from "./ndjson.js";
export { emptySummary, mergeSummaries } from "./summary.js";
