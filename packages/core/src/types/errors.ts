/**
 * @summary Custom error classes for geolocation lookups.
 *
 * This file defines a hierarchy of typed errors for precise error handling
 * in query dispatch. Each error type carries the context needed to act on it
 * programmatically.
 *
 * Note that an application-level `fail` status returned by the service is
 * not an error here: it is delivered to the caller as a normal result.
 *
 * Used by:
 * - The query normalizer and batch chunker for input and tuning errors
 * - The retrying transport and dispatcher for network and HTTP failures
 * - Client code to branch on `code` or `instanceof`
 */

// ---------------------------------------------------------------------------
// Base Error
// ---------------------------------------------------------------------------

/**
 * Base class for all errors raised by the SDK.
 *
 * Provides common functionality including error code and optional cause.
 */
export abstract class IpApiError extends Error {
  /** Machine-readable error code for programmatic handling */
  abstract readonly code: string;

  /** Original error that caused this error, if any */
  override readonly cause?: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;

    // Maintains proper stack trace for where our error was thrown (V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause?.message,
    };
  }
}

// ---------------------------------------------------------------------------
// Input Errors
// ---------------------------------------------------------------------------

/**
 * Error thrown when a query item is malformed (missing or empty target,
 * badly typed overrides).
 *
 * In streamed lookups this only fails the position of the offending item.
 */
export class InvalidQueryError extends IpApiError {
  readonly code = "INVALID_QUERY" as const;

  /** The raw item that could not be normalized */
  readonly item: unknown;

  constructor(message: string, item: unknown) {
    super(message);
    this.item = item;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      item: this.item,
    };
  }
}

/**
 * Error thrown when a domain name is sent to the batch endpoint, which only
 * resolves IP addresses.
 */
export class UnsupportedQueryError extends IpApiError {
  readonly code = "UNSUPPORTED_QUERY" as const;

  /** The target the batch endpoint cannot resolve */
  readonly target: string;

  constructor(target: string) {
    super(
      `Domain name "${target}" cannot be resolved by the batch endpoint; ` +
        `look it up on its own instead`
    );
    this.target = target;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      target: this.target,
    };
  }
}

/**
 * Error thrown when a tuning parameter is out of range.
 */
export class ConfigurationError extends IpApiError {
  readonly code = "CONFIGURATION" as const;

  /** Name of the offending option */
  readonly option: string;

  /** The rejected value */
  readonly value: unknown;

  constructor(option: string, value: unknown, requirement: string) {
    super(`Invalid ${option}: ${String(value)} (${requirement})`);
    this.option = option;
    this.value = value;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      option: this.option,
      value: this.value,
    };
  }
}

// ---------------------------------------------------------------------------
// Network Errors
// ---------------------------------------------------------------------------

/**
 * Error raised by an HTTP session when the exchange did not complete:
 * connection refused or reset, DNS failure, timeout.
 *
 * This is the only failure class the retrying transport retries.
 */
export class TransportError extends IpApiError {
  readonly code = "TRANSPORT" as const;

  /** Request URL */
  readonly url: string;

  /** Whether the request hit the session timeout */
  readonly timedOut: boolean;

  constructor(url: string, cause?: Error, timedOut = false) {
    super(
      timedOut
        ? `Request to ${url} timed out`
        : `Request to ${url} failed: ${cause?.message ?? "network error"}`,
      cause
    );
    this.url = url;
    this.timedOut = timedOut;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      url: this.url,
      timedOut: this.timedOut,
    };
  }
}

/**
 * Error thrown when every attempt of one exchange failed at the transport
 * level.
 */
export class NetworkExhaustedError extends IpApiError {
  readonly code = "NETWORK_EXHAUSTED" as const;

  /** Number of attempts made */
  readonly attempts: number;

  constructor(attempts: number, cause?: Error) {
    super(
      `Network request failed after ${attempts} attempt${attempts === 1 ? "" : "s"}` +
        (cause ? `: ${cause.message}` : ""),
      cause
    );
    this.attempts = attempts;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      attempts: this.attempts,
    };
  }
}

/**
 * Error thrown when a request is issued on a session that was closed.
 */
export class SessionClosedError extends IpApiError {
  readonly code = "SESSION_CLOSED" as const;

  constructor(message = "HTTP session is closed") {
    super(message);
  }
}

// ---------------------------------------------------------------------------
// HTTP Errors
// ---------------------------------------------------------------------------

/**
 * Error thrown for an HTTP status the client has no dedicated handling for.
 */
export class HttpStatusError extends IpApiError {
  readonly code = "HTTP_STATUS" as const;

  /** HTTP status code */
  readonly status: number;

  constructor(status: number, message = `HTTP ${status} error occurred`) {
    super(message);
    this.status = status;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      status: this.status,
    };
  }
}

/**
 * Error thrown on HTTP 429 when an API key is configured. Without a key the
 * client degrades the affected results to `fail` instead.
 */
export class TooManyRequestsError extends IpApiError {
  readonly code = "TOO_MANY_REQUESTS" as const;

  readonly status = 429 as const;

  constructor(message = "Too many requests (429) with an API key") {
    super(message);
  }
}

/**
 * Error thrown on HTTP 422, which the batch endpoint returns when a request
 * holds more queries than it accepts.
 */
export class BatchTooLargeError extends IpApiError {
  readonly code = "BATCH_TOO_LARGE" as const;

  readonly status = 422 as const;

  /** Number of queries that were sent */
  readonly batchSize: number;

  constructor(batchSize: number) {
    super(`Batch size is too large (422): ${batchSize} queries were sent`);
    this.batchSize = batchSize;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      batchSize: this.batchSize,
    };
  }
}

/**
 * Error thrown on HTTP 403, usually an invalid or expired API key.
 */
export class AuthError extends IpApiError {
  readonly code = "AUTH" as const;

  readonly status = 403 as const;

  constructor(message = "Forbidden (403). Please check your API key") {
    super(message);
  }
}

/**
 * Error thrown when a response body does not have the expected shape.
 */
export class InvalidResponseError extends IpApiError {
  readonly code = "INVALID_RESPONSE" as const;

  constructor(message: string) {
    super(message);
  }
}

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

/**
 * Type guard to check if an error is an IpApiError.
 */
export function isIpApiError(error: unknown): error is IpApiError {
  return error instanceof IpApiError;
}

/**
 * Node.js error codes that signal a transport-level failure.
 */
const RETRYABLE_NETWORK_CODES: ReadonlySet<string> = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

/**
 * Type guard to check if an error is a transport-level failure worth retrying.
 *
 * Completed HTTP exchanges are never retryable, whatever their status.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof TransportError) {
    return true;
  }
  if (isIpApiError(error)) {
    return false;
  }
  if (typeof error === "object" && error !== null && "code" in error) {
    const code = error.code;
    return typeof code === "string" && RETRYABLE_NETWORK_CODES.has(code);
  }
  return false;
}
