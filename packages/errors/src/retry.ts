import { AppError } from "./app-error.js";

export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. Default: 500 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Called before sleeping ahead of each retry. */
  onRetry?: (info: { attempt: number; maxRetries: number; delayMs: number; error: unknown }) => void;
  /** Stops further attempts once aborted; the last error is rethrown. */
  signal?: AbortSignal;
}

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">
> = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
};

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

/**
 * Client errors (4xx) are never retried; server errors (5xx) and plain
 * network failures are.
 */
export function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  if (AppError.isAppError(error)) {
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return false;
    }
    if (retryableErrors && retryableErrors.length > 0) {
      return retryableErrors.includes(error.code);
    }
    return error.statusCode >= 500;
  }

  if (retryableErrors && retryableErrors.length > 0) {
    const code = errorCode(error);
    return code !== undefined && retryableErrors.includes(code);
  }

  return true;
}

/**
 * delay = min(maxDelay, baseDelay * 2^attempt) * random(0.5, 1.0)
 */
function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(maxDelayMs, exponentialDelay);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic using exponential backoff and jitter.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxRetries = options?.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries;
  const baseDelayMs = options?.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs;
  const maxDelayMs = options?.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  const retryableErrors = options?.retryableErrors;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxRetries || options?.signal?.aborted) {
        break;
      }
      if (!isRetryable(error, retryableErrors)) {
        break;
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs);
      options?.onRetry?.({ attempt: attempt + 1, maxRetries, delayMs, error });
      await sleep(delayMs);
    }
  }

  throw lastError;
}
