import { once } from "node:events";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { z } from "zod";
import type { RawRecord } from "@collabrag/types";
import { MalformedRecordError } from "@collabrag/errors";

const rawRecordLineSchema = z.object({
  source: z.enum(["jira", "confluence", "sharepoint", "teams"]),
  payload: z.record(z.unknown()),
});

/** One RawRecord as a single NDJSON line, without the trailing newline. */
export function serializeRawRecord(record: RawRecord): string {
  return JSON.stringify({ source: record.source, payload: record.payload });
}

/**
 * Parse one NDJSON line. Throws MalformedRecordError naming the line when it
 * is not JSON or not a `{ source, payload }` object.
 */
export function parseRawRecordLine(line: string, lineNumber = 1): RawRecord {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    throw new MalformedRecordError(`Line ${String(lineNumber)}: invalid JSON`, {
      details: { lineNumber },
      cause: error,
    });
  }

  const result = rawRecordLineSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    throw new MalformedRecordError(`Line ${String(lineNumber)}: ${issues.join("; ")}`, {
      details: { lineNumber, issues },
    });
  }

  return result.data;
}

/**
 * Stream RawRecords from NDJSON input. Blank lines are skipped but still
 * counted, so error line numbers match the file.
 */
export async function* readRawRecords(input: Readable): AsyncGenerator<RawRecord> {
  const lines = createInterface({ input, crlfDelay: Infinity });
  let lineNumber = 0;

  try {
    for await (const line of lines) {
      lineNumber++;
      if (line.trim() === "") continue;
      yield parseRawRecordLine(line, lineNumber);
    }
  } finally {
    lines.close();
  }
}

/** Write records as NDJSON, waiting for drain under backpressure. Returns the count written. */
export async function writeRawRecords(
  records: AsyncIterable<RawRecord> | Iterable<RawRecord>,
  output: Writable,
): Promise<number> {
  let count = 0;
  for await (const record of records) {
    if (!output.write(`${serializeRawRecord(record)}\n`)) {
      await once(output, "drain");
    }
    count++;
  }
  return count;
}
