import { AppError } from "./app-error.js";

export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. Default: 500 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 8000 */
  maxDelayMs?: number;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Called before each backoff sleep. */
  onRetry?: (info: { attempt: number; maxRetries: number; delayMs: number; error: unknown }) => void;
}

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">
> = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
};

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Client errors (4xx) are never retried; server errors (5xx) and
 * non-application errors (sockets, timeouts) are.
 */
export function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  const filtered = retryableErrors !== undefined && retryableErrors.length > 0;

  if (AppError.isAppError(error)) {
    if (error.isClientError) {
      return false;
    }
    if (filtered) {
      return retryableErrors.includes(error.code);
    }
    return error.statusCode >= 500;
  }

  if (filtered) {
    const code = errorCode(error);
    return code !== undefined && retryableErrors.includes(code);
  }

  return true;
}

/**
 * delay = min(maxDelay, baseDelay * 2^attempt) * random(0.5, 1.0)
 */
function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const cappedDelay = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt));
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with exponential backoff and jitter.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs } = { ...DEFAULT_RETRY_OPTIONS, ...options };

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxRetries || !isRetryable(error, options?.retryableErrors)) {
        break;
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs);
      options?.onRetry?.({ attempt: attempt + 1, maxRetries, delayMs, error });
      await sleep(delayMs);
    }
  }

  throw lastError;
}
