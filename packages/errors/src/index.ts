export { AppError } from "./app-error.js";
export type { AppErrorOptions, SerializedAppError } from "./app-error.js";

export {
  NotFoundError,
  ValidationError,
  ExternalServiceError,
  ExtractionFailureError,
  NoRetrievableContextError,
  InsufficientContextError,
  GenerationCapabilityError,
} from "./errors.js";
export type { RetrievalStage } from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions, CircuitState } from "./circuit-breaker.js";

export { withRetry, isRetryable } from "./retry.js";
export type { RetryOptions } from "./retry.js";
