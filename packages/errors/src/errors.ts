import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...options });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string> = {}, options?: ErrorExtras) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", ...options });
    this.fields = fields;
  }
}

/** Missing credentials or settings for a selected provider. Fatal, never retried. */
export class ConfigurationError extends AppError {
  constructor(message: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 500,
      code: "CONFIGURATION_ERROR",
      isOperational: false,
      ...options,
    });
  }
}

export interface ProviderErrorContext {
  provider: string;
  operation: string;
  attempts?: number;
  upstreamStatus?: number;
}

function providerDetails(context: ProviderErrorContext): Record<string, unknown> {
  return {
    provider: context.provider,
    operation: context.operation,
    ...(context.attempts !== undefined ? { attempts: context.attempts } : {}),
    ...(context.upstreamStatus !== undefined ? { upstreamStatus: context.upstreamStatus } : {}),
  };
}

/** Health or connectivity check failed; callers fall back or degrade. */
export class ProviderUnavailableError extends AppError {
  public readonly provider: string;

  constructor(message: string, context: ProviderErrorContext, cause?: unknown) {
    super({
      message,
      statusCode: 503,
      code: "PROVIDER_UNAVAILABLE",
      details: providerDetails(context),
      cause,
    });
    this.provider = context.provider;
  }
}

export class RateLimitedError extends AppError {
  /** Seconds the server asked us to wait, 0 when no hint was given. */
  public readonly retryAfter: number;

  constructor(
    message = "Rate limited",
    retryAfter: number,
    options?: ErrorExtras,
  ) {
    super({ message, statusCode: 429, code: "RATE_LIMITED", ...options });
    this.retryAfter = retryAfter;
  }
}

/** A 5xx answer from a provider. Retried by the gateway. */
export class TransientProviderError extends AppError {
  public readonly provider: string;

  constructor(message: string, context: ProviderErrorContext, cause?: unknown) {
    super({
      message,
      statusCode: 502,
      code: "PROVIDER_TRANSIENT",
      details: providerDetails(context),
      cause,
    });
    this.provider = context.provider;
  }
}

/** The provider rejected the request (auth, malformed input). Not retried. */
export class ProviderRequestError extends AppError {
  public readonly provider: string;

  constructor(message: string, context: ProviderErrorContext, cause?: unknown) {
    const status = context.upstreamStatus;
    super({
      message,
      statusCode: status !== undefined && status >= 400 && status < 500 ? status : 400,
      code: "PROVIDER_REJECTED",
      details: providerDetails(context),
      cause,
    });
    this.provider = context.provider;
  }
}

/** Terminal provider failure, raised once the retry policy is exhausted. */
export class ProviderFailureError extends AppError {
  public readonly provider: string;
  public readonly operation: string;
  public readonly attempts: number;

  constructor(message: string, context: ProviderErrorContext, cause?: unknown) {
    super({
      message,
      statusCode: 502,
      code: "PROVIDER_FAILURE",
      isOperational: false,
      details: providerDetails(context),
      cause,
    });
    this.provider = context.provider;
    this.operation = context.operation;
    this.attempts = context.attempts ?? 1;
  }
}

export class EmbeddingCountMismatchError extends AppError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, provider: string) {
    super({
      message: `Mismatch in returned embeddings count from ${provider}: expected ${String(expected)}, got ${String(actual)}`,
      statusCode: 502,
      code: "EMBEDDING_COUNT_MISMATCH",
      isOperational: false,
      details: { provider, expected, actual },
    });
    this.expected = expected;
    this.actual = actual;
  }
}

export class DimensionMismatchError extends AppError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, context?: string) {
    super({
      message: `Embedding dimension mismatch${context ? ` (${context})` : ""}: store uses ${String(expected)}, got ${String(actual)}`,
      statusCode: 500,
      code: "DIMENSION_MISMATCH",
      isOperational: false,
      details: { expected, actual },
    });
    this.expected = expected;
    this.actual = actual;
  }
}

export class StoreUnavailableError extends AppError {
  constructor(message = "Vector store is not available", options?: ErrorExtras) {
    super({ message, statusCode: 503, code: "STORE_UNAVAILABLE", ...options });
  }
}

export class CacheFullError extends AppError {
  public readonly maxDocuments: number;

  constructor(maxDocuments: number) {
    super({
      message: `Cache full: maximum ${String(maxDocuments)} documents allowed`,
      statusCode: 507,
      code: "CACHE_FULL",
      details: { maxDocuments },
    });
    this.maxDocuments = maxDocuments;
  }
}
