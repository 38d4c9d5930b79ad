/**
 * @summary Central export point for type definitions in @ipgeo/core.
 *
 * Usage:
 * ```typescript
 * import type { CanonicalQuery, LocationResult } from "@ipgeo/core/types";
 * ```
 */

export type {
  QueryOverride,
  QueryInput,
  QuerySource,
  PlainQueryItem,
  OverrideQueryItem,
  QueryItem,
  QueryDefaults,
  CanonicalQuery,
  QueryBatch,
} from "./query.js";

export type { LocationStatus, LocationResult } from "./result.js";
export { isLocationResult, failedResult } from "./result.js";

export type { EndpointClass, RateBudgetState, RetryPolicy } from "./rate-limit.js";

export type { HttpMethod, HttpRequest, HttpResponse, HttpSession } from "./http.js";

export { RATE_LIMIT_HEADERS, type RateLimitHeaderName } from "./headers.js";

export {
  IpApiError,
  InvalidQueryError,
  UnsupportedQueryError,
  ConfigurationError,
  TransportError,
  NetworkExhaustedError,
  SessionClosedError,
  HttpStatusError,
  TooManyRequestsError,
  BatchTooLargeError,
  AuthError,
  InvalidResponseError,
  isIpApiError,
  isRetryableError,
} from "./errors.js";
