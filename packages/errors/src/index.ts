export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  TransportError,
  MalformedRecordError,
  ConfigurationError,
  EmbeddingProviderError,
  IndexWriteError,
  errorMessage,
} from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions } from "./circuit-breaker.js";

export { withRetry, isRetryable } from "./retry.js";
export type { RetryOptions } from "./retry.js";
