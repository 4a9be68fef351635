import CircuitBreaker from "opossum";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 30000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Minimum number of calls in the rolling window before the circuit may open. Default: 5 */
  volumeThreshold?: number;
  /** Receives state transitions; the breaker itself does not log. */
  onStateChange?: (name: string, state: "open" | "halfOpen" | "close") => void;
}

const DEFAULT_OPTIONS = {
  timeout: 30_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
  volumeThreshold: 5,
};

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TArgs, TResult> {
  const breaker = new CircuitBreaker(fn, {
    name,
    timeout: options?.timeout ?? DEFAULT_OPTIONS.timeout,
    errorThresholdPercentage:
      options?.errorThresholdPercentage ?? DEFAULT_OPTIONS.errorThresholdPercentage,
    resetTimeout: options?.resetTimeout ?? DEFAULT_OPTIONS.resetTimeout,
    volumeThreshold: options?.volumeThreshold ?? DEFAULT_OPTIONS.volumeThreshold,
  });

  const onStateChange = options?.onStateChange;

  if (onStateChange) {
    breaker.on("open", () => onStateChange(name, "open"));
    breaker.on("halfOpen", () => onStateChange(name, "halfOpen"));
    breaker.on("close", () => onStateChange(name, "close"));
  }

  return breaker;
}
