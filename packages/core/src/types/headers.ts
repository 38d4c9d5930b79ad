/**
 * @summary HTTP header names used by the geolocation service.
 *
 * Header lookups go through the `Headers` class, which compares names
 * case-insensitively.
 *
 * Used by:
 * - The rate budget tracker to read the remaining budget after each response
 * - Test servers that emulate the service
 */

/**
 * Rate limit headers sent on every response of the free endpoints.
 */
export const RATE_LIMIT_HEADERS = {
  /**
   * Requests remaining in the current window for the endpoint class.
   * Integer, 0 once the window is spent.
   */
  REMAINING: "X-Rl",

  /**
   * Seconds until the window resets.
   */
  TTL: "X-Ttl",
} as const;

/**
 * Type for rate limit header names.
 */
export type RateLimitHeaderName =
  (typeof RATE_LIMIT_HEADERS)[keyof typeof RATE_LIMIT_HEADERS];
