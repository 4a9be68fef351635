/**
 * Creates structured pino loggers with credential redaction, pretty-printing
 * in development and JSON output elsewhere.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, redactFields } from "./pii-redactor.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** Where JSON lines go instead of stdout; ignored when pretty-printing. */
  destination?: pino.DestinationStream;
  /** Write to stderr instead of stdout, for commands whose stdout carries data. */
  stderr?: boolean;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function buildTransport(fd: 1 | 2): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
        destination: fd,
      },
    };
  }
  return undefined;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "collabrag";

  const fd = options?.stderr ? 2 : 1;
  const transport = buildTransport(fd);

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    formatters: {
      log: redactFields,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(transport ? { transport } : {}),
  };

  if (!transport && options?.destination) {
    return pino(pinoOptions, options.destination);
  }
  if (!transport && fd === 2) {
    return pino(pinoOptions, pino.destination(2));
  }
  return pino(pinoOptions);
}

/**
 * Child logger carrying run-scoped bindings such as `source` or `runId`.
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/**
 * Logger that discards everything; for tests and library callers without one.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
