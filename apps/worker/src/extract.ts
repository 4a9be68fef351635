import type { SourceType } from "@collabrag/types";
import { SOURCE_TYPES } from "@collabrag/types";
import { parseEnv } from "@collabrag/config";
import { createLogger } from "@collabrag/logger";
import { errorMessage } from "@collabrag/errors";
import { configuredSources, createConnector } from "@collabrag/connectors";
import { writeRawRecords } from "@collabrag/core";

function isSourceType(value: string): value is SourceType {
  return SOURCE_TYPES.some((source) => source === value);
}

/**
 * Write the raw records of one or more sources to stdout as NDJSON, ready for
 * `npm run load`. Logs go to stderr.
 *
 *   npm run -s extract -- jira confluence > records.ndjson
 */
async function main(): Promise<void> {
  const requested = process.argv.slice(2);
  const unknown = requested.filter((name) => !isSourceType(name));
  if (unknown.length > 0) {
    process.stderr.write(`Unknown source(s): ${unknown.join(", ")}. Expected: ${SOURCE_TYPES.join(", ")}\n`);
    process.exit(2);
  }

  const config = parseEnv();
  const logger = createLogger({ service: "collabrag-extract", level: config.logLevel, stderr: true });
  const sources = requested.length > 0 ? requested.filter(isSourceType) : configuredSources(config);

  const controller = new AbortController();
  process.on("SIGINT", () => controller.abort());

  for (const source of sources) {
    const connector = createConnector(source, config, { logger });
    const count = await writeRawRecords(connector.fetchAll({ signal: controller.signal }), process.stdout);
    logger.info({ source, records: count }, "Source extracted");
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`[extract] ${errorMessage(err)}\n`);
  process.exit(1);
});
