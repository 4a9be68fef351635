import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Network, timeout or auth failure while talking to a source provider.
 * Aborts pagination for that source only.
 */
export class TransportError extends AppError {
  public readonly service: string;
  public readonly status?: number;

  constructor(message: string, service: string, options?: ErrorExtras & { status?: number }) {
    const status = options?.status;
    super({
      message,
      // Upstream 4xx keeps its status so callers never retry auth or request errors
      statusCode: status !== undefined && status >= 400 && status < 500 ? status : 502,
      code: "TRANSPORT_ERROR",
      details: { service, ...(status !== undefined ? { status } : {}), ...options?.details },
      cause: options?.cause,
    });
    this.service = service;
    this.status = status;
  }
}

/** A raw record lacks the fields needed to build a canonical document. */
export class MalformedRecordError extends AppError {
  constructor(message = "Malformed record", options?: ErrorExtras) {
    super({
      message,
      statusCode: 422,
      code: "MALFORMED_RECORD",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ConfigurationError extends AppError {
  public readonly issues: string[];

  constructor(message = "Invalid configuration", issues: string[] = [], options?: ErrorExtras) {
    super({
      message: issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join("\n")}` : message,
      statusCode: 500,
      code: "CONFIGURATION_ERROR",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
    this.issues = issues;
  }
}

export class EmbeddingProviderError extends AppError {
  public readonly provider: string;

  constructor(message = "Embedding provider error", provider: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "EMBEDDING_PROVIDER_ERROR",
      details: { provider, ...options?.details },
      cause: options?.cause,
    });
    this.provider = provider;
  }
}

/** The vector index could not be read or written; the run cannot continue. */
export class IndexWriteError extends AppError {
  constructor(message = "Vector index unavailable", options?: ErrorExtras) {
    super({
      message,
      statusCode: 503,
      code: "INDEX_WRITE_ERROR",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/** Reduce any thrown value to a message suitable for logs and run summaries. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
