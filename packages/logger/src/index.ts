/**
 * @collabrag/logger
 *
 * Structured logging with credential redaction.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, redactFields, REDACT_PATHS } from "./pii-redactor.js";
