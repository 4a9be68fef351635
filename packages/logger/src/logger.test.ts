import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import { createLogger, createChildLogger } from "./logger.js";

function capture(): { stream: Writable; lines: () => Record<string, unknown>[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return {
    stream,
    lines: () =>
      chunks
        .join("")
        .split("\n")
        .filter((line) => line.length > 0)
        .map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

describe("createLogger", () => {
  it("writes JSON lines with the service name and level", () => {
    const out = capture();
    const logger = createLogger({ service: "ingest", level: "info", destination: out.stream });

    logger.info({ source: "jira" }, "run started");
    logger.debug("hidden");

    const [line] = out.lines();
    expect(out.lines()).toHaveLength(1);
    expect(line).toMatchObject({ name: "ingest", level: 30, source: "jira", msg: "run started" });
  });

  it("redacts credentials at the top level and in nested objects", () => {
    const out = capture();
    const logger = createLogger({ destination: out.stream });

    logger.info({ apiToken: "t-1", jira: { apiToken: "t-2", baseUrl: "https://jira.test" } }, "cfg");

    const [line] = out.lines();
    expect(line?.["apiToken"]).toBe("[REDACTED]");
    expect(line?.["jira"]).toEqual({ apiToken: "[REDACTED]", baseUrl: "https://jira.test" });
  });

  it("masks emails in string fields", () => {
    const out = capture();
    const logger = createLogger({ destination: out.stream });

    logger.info({ author: "dev@example.com" }, "indexed");

    expect(out.lines()[0]?.["author"]).toBe("[REDACTED]");
  });

  it("child loggers carry their bindings", () => {
    const out = capture();
    const child = createChildLogger(createLogger({ destination: out.stream }), { source: "teams" });

    child.warn("slow page");

    expect(out.lines()[0]).toMatchObject({ source: "teams", level: 40, msg: "slow page" });
  });
});
