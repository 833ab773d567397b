import { AppError, isAbortError } from "./app-error.js";
import { RateLimitedError } from "./errors.js";

export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum backoff delay in milliseconds. A server Retry-After hint may exceed it. Default: 10000 */
  maxDelayMs?: number;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Aborting stops further attempts and cancels a pending backoff sleep. */
  signal?: AbortSignal;
  /** Called before each backoff sleep. Defaults to a console warning. */
  onRetry?: (info: RetryAttemptInfo) => void;
}

export interface RetryAttemptInfo {
  /** 1-based number of the attempt that just failed */
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: unknown;
}

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">
> = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
};

/**
 * Determines whether an error is retryable.
 * Non-operational errors and client errors (4xx) are NOT retried, with the
 * exception of 429; server errors (5xx) and network errors ARE retried.
 */
function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  if (isAbortError(error)) {
    return false;
  }

  if (AppError.isAppError(error)) {
    if (!error.isOperational) {
      return false;
    }

    // If retryableErrors list is specified, only retry matching codes
    if (retryableErrors && retryableErrors.length > 0) {
      return retryableErrors.includes(error.code);
    }

    if (error instanceof RateLimitedError) {
      return true;
    }

    return error.statusCode >= 500;
  }

  // Non-AppError errors (e.g. network failures, unexpected errors) are retryable
  // unless a retryableErrors filter is specified
  if (retryableErrors && retryableErrors.length > 0) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    return typeof code === "string" && retryableErrors.includes(code);
  }

  return true;
}

/**
 * Calculate delay with exponential backoff and jitter.
 * delay = min(maxDelay, baseDelay * 2^attempt) * random(0.5, 1.0)
 */
export function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(maxDelayMs, exponentialDelay);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function defaultOnRetry({ attempt, maxRetries, delayMs }: RetryAttemptInfo): void {
  console.warn(
    `[retry] Attempt ${String(attempt)}/${String(maxRetries)} failed, retrying in ${String(delayMs)}ms...`,
  );
}

/**
 * Execute a function with retry logic using exponential backoff and jitter.
 * A RateLimitedError carrying `retryAfter` waits at least that many seconds.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs } = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const retryableErrors = options?.retryableErrors;
  const signal = options?.signal;
  const onRetry = options?.onRetry ?? defaultOnRetry;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxRetries || signal?.aborted) {
        break;
      }

      if (!isRetryable(error, retryableErrors)) {
        break;
      }

      let delay = calculateDelay(attempt, baseDelayMs, maxDelayMs);
      if (error instanceof RateLimitedError && error.retryAfter > 0) {
        delay = Math.max(delay, error.retryAfter * 1_000);
      }

      onRetry({ attempt: attempt + 1, maxRetries, delayMs: delay, error });
      await sleep(delay, signal);
    }
  }

  throw lastError;
}
