export { AppError, errorMessage, isAbortError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  ValidationError,
  ConfigurationError,
  ProviderUnavailableError,
  RateLimitedError,
  TransientProviderError,
  ProviderRequestError,
  ProviderFailureError,
  EmbeddingCountMismatchError,
  DimensionMismatchError,
  StoreUnavailableError,
  CacheFullError,
} from "./errors.js";
export type { ProviderErrorContext } from "./errors.js";

export { withRetry, calculateDelay } from "./retry.js";
export type { RetryOptions, RetryAttemptInfo } from "./retry.js";
