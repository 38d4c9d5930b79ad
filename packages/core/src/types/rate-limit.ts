/**
 * @summary Rate budget and retry policy types.
 *
 * The service enforces separate request budgets on its single-query and
 * batch endpoints and reports what is left on every response.
 */

/**
 * Endpoint class, each with its own rate budget.
 */
export type EndpointClass = "single" | "batch";

/**
 * Last known rate budget for one endpoint class.
 *
 * Fields are only ever set from the most recent response headers; a
 * missing header leaves the previous value in place.
 */
export interface RateBudgetState {
  /** Requests left in the current window, undefined until reported */
  remaining?: number;

  /** Milliseconds until the window resets, undefined until reported */
  resetAfterMs?: number;

  /** Epoch milliseconds of the last update */
  observedAt: number;
}

/**
 * Bounded retry policy for one network exchange.
 */
export interface RetryPolicy {
  /** Total attempts, at least 1 */
  maxAttempts: number;

  /** Fixed delay between attempts in milliseconds */
  delayMs: number;
}
