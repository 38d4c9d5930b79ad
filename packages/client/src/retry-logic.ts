/**
 * @summary Bounded fixed-delay retry for network exchanges.
 *
 * This module wraps one HTTP exchange with retry-on-network-failure
 * semantics. Only transport-level failures (connection refused or reset,
 * DNS failure, timeout) are retried. A completed exchange is returned as
 * is, whatever its status: an application-level `fail` is a normal result
 * and a 429 is the rate limiter's business, not something to loop on.
 *
 * Features:
 * - Configurable attempt count and fixed delay
 * - Retry callback and debug logging per retry
 * - `NetworkExhaustedError` carrying the last failure once attempts run out
 *
 * Rate-limit waiting is separate and does not count against attempts.
 *
 * Used by:
 * - Dispatcher, for every single and batch exchange
 */

import type {
  HttpRequest,
  HttpResponse,
  HttpSession,
  RetryPolicy,
} from "@ipgeo/core";
import {
  ConfigurationError,
  NetworkExhaustedError,
  assertPositiveInteger,
  isRetryableError,
  sleep,
  silentLogger,
} from "@ipgeo/core";
import type { Logger, SleepFn } from "@ipgeo/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Options for retry behavior beyond the policy itself.
 */
export interface RetryOptions {
  /**
   * Suspension function used between attempts.
   * @default sleep
   */
  sleep?: SleepFn;

  /**
   * Logger for retry notices.
   */
  logger?: Logger;

  /**
   * Callback invoked before each retry with the 1-based number of the
   * attempt that failed.
   */
  onRetry?: (attempt: number, error: Error) => void;
}

/**
 * Default retry policy.
 */
export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxAttempts: 3,
  delayMs: 1000,
});

// ---------------------------------------------------------------------------
// Retry Logic
// ---------------------------------------------------------------------------

/**
 * Run an async operation with bounded fixed-delay retries.
 *
 * Errors that are not transport-level failures are re-thrown at once.
 *
 * @template T - Result type
 * @param fn - Operation to run
 * @param policy - Attempt count and delay
 * @param options - Sleep, logger and retry callback
 * @returns Result of the first successful attempt
 * @throws NetworkExhaustedError after `policy.maxAttempts` failed attempts
 *
 * @example
 * ```typescript
 * const response = await retryWithFixedDelay(
 *   () => session.send(request),
 *   { maxAttempts: 3, delayMs: 1000 }
 * );
 * ```
 */
export async function retryWithFixedDelay<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  options: RetryOptions = {}
): Promise<T> {
  assertRetryPolicy(policy);

  const { sleep: wait = sleep, logger = silentLogger, onRetry } = options;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isRetryableError(error)) {
        throw error;
      }
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === policy.maxAttempts) {
        break;
      }

      logger.debug(
        `Attempt ${attempt}/${policy.maxAttempts} failed (${lastError.message}), ` +
          `retrying in ${policy.delayMs} ms`
      );
      onRetry?.(attempt, lastError);

      await wait(policy.delayMs);
    }
  }

  throw new NetworkExhaustedError(policy.maxAttempts, lastError);
}

/**
 * Check a retry policy.
 *
 * @throws ConfigurationError when maxAttempts is not an integer >= 1 or
 *   delayMs is negative
 */
export function assertRetryPolicy(policy: RetryPolicy): void {
  assertPositiveInteger("retryAttempts", policy.maxAttempts);
  if (!Number.isFinite(policy.delayMs) || policy.delayMs < 0) {
    throw new ConfigurationError("retryDelayMs", policy.delayMs, "must be a finite number >= 0");
  }
}

// ---------------------------------------------------------------------------
// Retrying Transport
// ---------------------------------------------------------------------------

/**
 * HTTP session wrapper that retries transport-level failures.
 *
 * @example
 * ```typescript
 * const transport = new RetryingTransport(new FetchSession(), {
 *   maxAttempts: 3,
 *   delayMs: 1000,
 * });
 * const response = await transport.exchange({ method: "GET", url });
 * ```
 */
export class RetryingTransport {
  private readonly session: HttpSession;
  private readonly policy: RetryPolicy;
  private readonly options: RetryOptions;

  constructor(
    session: HttpSession,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    options: RetryOptions = {}
  ) {
    assertRetryPolicy(policy);
    this.session = session;
    this.policy = { ...policy };
    this.options = options;
  }

  /**
   * Perform one exchange, retrying transport-level failures.
   *
   * @param request - Request to send
   * @param policy - Policy for this exchange, defaults to the transport's
   * @returns The first completed exchange
   * @throws NetworkExhaustedError when every attempt failed
   */
  exchange(request: HttpRequest, policy: RetryPolicy = this.policy): Promise<HttpResponse> {
    return retryWithFixedDelay(() => this.session.send(request), policy, this.options);
  }
}
