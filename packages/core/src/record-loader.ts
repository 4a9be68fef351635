import type { IngestionRunResult, RawRecord, SourceRunResult, SourceStatus, SourceType } from "@collabrag/types";
import { validateWindow } from "@collabrag/chunker";
import { ingestSource } from "./ingestion-pipeline.js";
import type { IngestionDependencies } from "./ingestion-pipeline.js";
import { mergeSummaries } from "./summary.js";

const STATUS_RANK: Record<SourceStatus, number> = { completed: 0, cancelled: 1, aborted: 2 };

function mergeSourceResults(previous: SourceRunResult | undefined, next: SourceRunResult): SourceRunResult {
  if (!previous) return next;
  const status = STATUS_RANK[next.status] > STATUS_RANK[previous.status] ? next.status : previous.status;
  const error = previous.error ?? next.error;
  return {
    source: previous.source,
    status,
    summary: mergeSummaries(previous.summary, next.summary),
    documents: previous.documents + next.documents,
    malformedRecords: previous.malformedRecords + next.malformedRecords,
    ...(error !== undefined ? { error } : {}),
  };
}

/**
 * Load a stream of records from any mix of sources, such as the NDJSON the
 * extract command writes. Each run of consecutive records from one source is
 * ingested as a segment, and the segments of a source are merged into one
 * result. Loading stops after a segment that did not complete.
 *
 * A read error before the first record propagates; later ones end the source
 * being loaded, as a transport failure would.
 */
export async function loadRecords(
  records: AsyncIterable<RawRecord>,
  deps: IngestionDependencies,
  signal?: AbortSignal,
): Promise<IngestionRunResult> {
  validateWindow(deps.window);
  const startTime = Date.now();
  const iterator = records[Symbol.asyncIterator]();
  const results = new Map<SourceType, SourceRunResult>();

  let next: IteratorResult<RawRecord, unknown> = await iterator.next();

  async function* segment(first: RawRecord): AsyncGenerator<RawRecord> {
    yield first;
    for (;;) {
      const step = await iterator.next();
      if (step.done || step.value.source !== first.source) {
        next = step;
        return;
      }
      yield step.value;
    }
  }

  try {
    while (!next.done) {
      const first = next.value;
      // Only a segment that runs to a source change hands over the next record
      next = { done: true, value: undefined };

      const result = await ingestSource(first.source, segment(first), deps, signal);
      results.set(first.source, mergeSourceResults(results.get(first.source), result));
      if (result.status !== "completed") break;
    }
  } finally {
    await iterator.return?.();
  }

  const sources = [...results.values()];
  const result: IngestionRunResult = {
    summary: mergeSummaries(...sources.map((s) => s.summary)),
    sources,
    durationMs: Date.now() - startTime,
  };
  deps.logger.info({ summary: result.summary, durationMs: result.durationMs }, "Record load finished");
  return result;
}
