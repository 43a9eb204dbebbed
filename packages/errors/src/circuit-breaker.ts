import CircuitBreaker from "opossum";

export type CircuitState = "open" | "halfOpen" | "close";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 10000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
  /** Number of buckets in the rolling window. Default: 10 */
  rollingCountBuckets?: number;
  /** Errors for which this returns true do not count towards opening the circuit. */
  errorFilter?: (err: unknown) => boolean;
  onStateChange?: (name: string, state: CircuitState) => void;
}

const DEFAULT_OPTIONS = {
  timeout: 10_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
};

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TArgs, TResult> {
  const { onStateChange, ...breakerOptions } = options ?? {};
  const breaker = new CircuitBreaker(fn, { ...DEFAULT_OPTIONS, ...breakerOptions, name });

  if (onStateChange) {
    breaker.on("open", () => onStateChange(name, "open"));
    breaker.on("halfOpen", () => onStateChange(name, "halfOpen"));
    breaker.on("close", () => onStateChange(name, "close"));
  }

  return breaker;
}
