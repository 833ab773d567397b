import {
  AppError,
  ProviderRequestError,
  ProviderUnavailableError,
  RateLimitedError,
  TransientProviderError,
  errorMessage,
  isAbortError,
} from "@docweave/errors";
import type { ProviderErrorContext } from "@docweave/errors";

/** Seconds to wait from a Retry-After header, either delta-seconds or an HTTP date. */
export function parseRetryAfter(value: string | null | undefined, now = Date.now()): number {
  if (!value) return 0;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds);
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return 0;
  return Math.max(0, Math.ceil((date - now) / 1_000));
}

/**
 * 429 → RateLimitedError, 5xx → TransientProviderError, any other status →
 * ProviderRequestError.
 */
export function errorForStatus(
  status: number,
  message: string,
  context: ProviderErrorContext,
  retryAfter = 0,
  cause?: unknown,
): AppError {
  const withStatus = { ...context, upstreamStatus: status };

  if (status === 429) {
    return new RateLimitedError(message, retryAfter, {
      details: { provider: context.provider, operation: context.operation, upstreamStatus: status },
      cause,
    });
  }
  if (status >= 500) {
    return new TransientProviderError(message, withStatus, cause);
  }
  return new ProviderRequestError(message, withStatus, cause);
}

/**
 * Normalizes an SDK or fetch failure. SDK errors are recognized by their
 * `status`/`statusCode` field; anything without one is a connectivity
 * failure. Abort errors and AppErrors pass through unchanged.
 */
export function toProviderError(err: unknown, context: ProviderErrorContext): unknown {
  if (isAbortError(err) || AppError.isAppError(err)) {
    return err;
  }

  const status = readStatus(err);
  if (status !== undefined) {
    return errorForStatus(
      status,
      `${context.provider} ${context.operation} failed (${String(status)}): ${errorMessage(err)}`,
      context,
      readRetryAfter(err),
      err,
    );
  }

  return new ProviderUnavailableError(
    `${context.provider} is unreachable: ${errorMessage(err)}`,
    context,
    err,
  );
}

function readStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return undefined;
}

function readRetryAfter(err: unknown): number {
  if (typeof err !== "object" || err === null || !("headers" in err)) return 0;

  const headers = err.headers;
  if (headers instanceof Headers) {
    return parseRetryAfter(headers.get("retry-after"));
  }
  if (typeof headers === "object" && headers !== null && "retry-after" in headers) {
    const value = headers["retry-after"];
    return typeof value === "string" ? parseRetryAfter(value) : 0;
  }
  return 0;
}
