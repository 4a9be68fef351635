import type {
  CanonicalDocument,
  IConnector,
  IngestionRunResult,
  RawRecord,
  SourceRunResult,
  SourceStatus,
  SourceType,
} from "@collabrag/types";
import {
  ConfigurationError,
  IndexWriteError,
  MalformedRecordError,
  TransportError,
  errorMessage,
} from "@collabrag/errors";
import { chunkDocument, validateWindow } from "@collabrag/chunker";
import type { ChunkWindow, IChunker } from "@collabrag/chunker";
import { normalize } from "@collabrag/normalizer";
import type { IEmbeddingProvider } from "@collabrag/embeddings";
import type { IVectorStore } from "@collabrag/vector-store";
import { createChildLogger } from "@collabrag/logger";
import type { Logger } from "@collabrag/logger";
import { IncrementalUpserter } from "./upserter.js";
import { emptySummary, mergeSummaries } from "./summary.js";

export interface IngestionDependencies {
  chunker: IChunker;
  window: ChunkWindow;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  /** Changed chunks embedded per provider call. */
  batchSize: number;
  logger: Logger;
  /** Defaults to the per-source normalizers. */
  normalize?: (record: RawRecord) => CanonicalDocument;
}

export interface IngestionRunOptions {
  sources: SourceType[];
  connectorFor: (source: SourceType) => IConnector;
  deps: IngestionDependencies;
  signal?: AbortSignal;
}

/** Errors that end the whole run rather than a single source. */
function isFatal(error: unknown): boolean {
  return error instanceof IndexWriteError || error instanceof ConfigurationError;
}

/**
 * Ingestion pipeline for one source: Normalize -> Chunk -> Fingerprint -> Embed -> Store
 *
 * Records are processed strictly in order. A malformed record is skipped; a
 * transport failure ends the source with the writes made so far kept. Once
 * `signal` is aborted no further record is started and the chunks already
 * queued are written before returning. IndexWriteError and any unexpected
 * error propagate.
 */
export async function ingestSource(
  source: SourceType,
  records: AsyncIterable<RawRecord>,
  deps: IngestionDependencies,
  signal?: AbortSignal,
): Promise<SourceRunResult> {
  const logger = createChildLogger(deps.logger, { source });
  const toDocument = deps.normalize ?? normalize;
  const upserter = new IncrementalUpserter({
    embeddingProvider: deps.embeddingProvider,
    vectorStore: deps.vectorStore,
    batchSize: deps.batchSize,
    logger,
  });

  let documents = 0;
  let malformedRecords = 0;
  let status: SourceStatus = "completed";
  let failure: string | undefined;

  try {
    for await (const record of records) {
      if (signal?.aborted) {
        status = "cancelled";
        break;
      }

      let document: CanonicalDocument;
      try {
        document = toDocument(record);
      } catch (error) {
        if (!(error instanceof MalformedRecordError)) throw error;
        malformedRecords++;
        logger.warn({ err: error.message }, "Skipping malformed record");
        continue;
      }

      documents++;
      for (const chunk of chunkDocument(document, deps.chunker, deps.window)) {
        await upserter.add(chunk);
      }
    }
  } catch (error) {
    if (signal?.aborted && !isFatal(error)) {
      status = "cancelled";
    } else if (error instanceof TransportError || error instanceof MalformedRecordError) {
      status = "aborted";
      failure = error.message;
      logger.error({ err: error.message, code: error.code }, "Source aborted");
    } else {
      throw error;
    }
  }

  await upserter.flush();

  const summary = upserter.summary();
  if (status === "cancelled") {
    logger.info({ summary, documents }, "Source cancelled");
  } else {
    logger.info({ summary, documents, malformedRecords, status }, "Source ingested");
  }

  return {
    source,
    status,
    summary,
    documents,
    malformedRecords,
    ...(failure !== undefined ? { error: failure } : {}),
  };
}

function failedSource(source: SourceType, error: unknown, logger: Logger): SourceRunResult {
  logger.error({ source, err: errorMessage(error) }, "Source failed");
  return {
    source,
    status: "aborted",
    summary: emptySummary(),
    documents: 0,
    malformedRecords: 0,
    error: errorMessage(error),
  };
}

/**
 * Ingest every requested source concurrently. Each source keeps its own tally
 * and the tallies are merged once all have settled. A fatal error in any
 * source (IndexWriteError, ConfigurationError) aborts the others and is
 * rethrown after they stop.
 */
export async function runIngestion(options: IngestionRunOptions): Promise<IngestionRunResult> {
  const { deps, signal } = options;
  validateWindow(deps.window);

  const startTime = Date.now();
  const controller = new AbortController();
  const onAbort = (): void => {
    controller.abort(signal?.reason);
  };
  if (signal?.aborted) {
    onAbort();
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }

  const fatalErrors: unknown[] = [];

  const settled = await Promise.allSettled(
    options.sources.map(async (source) => {
      try {
        const connector = options.connectorFor(source);
        return await ingestSource(
          source,
          connector.fetchAll({ signal: controller.signal }),
          deps,
          controller.signal,
        );
      } catch (error) {
        if (!isFatal(error)) return failedSource(source, error, deps.logger);
        fatalErrors.push(error);
        controller.abort(error);
        throw error;
      }
    }),
  );

  signal?.removeEventListener("abort", onAbort);

  const [fatal] = fatalErrors;
  if (fatal !== undefined) {
    deps.logger.error({ err: errorMessage(fatal) }, "Ingestion run failed");
    throw fatal;
  }

  const sources = settled.flatMap((outcome) => (outcome.status === "fulfilled" ? [outcome.value] : []));

  const result: IngestionRunResult = {
    summary: mergeSummaries(...sources.map((s) => s.summary)),
    sources,
    durationMs: Date.now() - startTime,
  };

  deps.logger.info({ summary: result.summary, durationMs: result.durationMs }, "Ingestion run finished");
  return result;
}
