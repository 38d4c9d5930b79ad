/**
 * @summary Main entry point for @ipgeo/client package.
 *
 * This package provides the IpApiClient for looking up IP geolocation data
 * on ip-api.com, with:
 *
 * - Single, batched and streamed lookups with per-query overrides
 * - Server-reported rate budget tracking with automatic waits
 * - Bounded fixed-delay retry of network failures
 * - Free and pro (API key) hosts
 *
 * Usage:
 * ```typescript
 * import { createIpApiClient, location } from "@ipgeo/client";
 *
 * const client = createIpApiClient({ fields: ["country", "city"] });
 * const result = await client.location("8.8.8.8");
 * await client.close();
 *
 * // Or one-shot, closing the client afterwards
 * const results = await location(["1.1.1.1", "8.8.8.8"], { lang: "de" });
 * ```
 */

// ---------------------------------------------------------------------------
// Main Client
// ---------------------------------------------------------------------------

export {
  IpApiClient,
  createIpApiClient,
  withIpApiClient,
  location,
  locationStream,
  isQuerySource,
  type IpApiClientConfig,
  type LocationOptions,
  type OneShotOptions,
} from "./client.js";

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------

export {
  Dispatcher,
  assertOkStatus,
  decodeBatch,
  TOO_MANY_REQUESTS_MESSAGE,
  type DispatcherConfig,
  type DispatchOptions,
} from "./dispatcher.js";

export {
  EndpointRouter,
  resolveHost,
  type EndpointRouterConfig,
  type SingleQuery,
  type BatchElement,
} from "./endpoint-router.js";

export {
  FetchSession,
  createFetchSession,
  type FetchSessionConfig,
} from "./http-session.js";

export {
  RateBudgetTracker,
  type RateBudgetTrackerOptions,
} from "./rate-budget-tracker.js";

export {
  RetryingTransport,
  retryWithFixedDelay,
  assertRetryPolicy,
  DEFAULT_RETRY_POLICY,
  type RetryOptions,
} from "./retry-logic.js";

export {
  toQueryItem,
  isPlainQuery,
  normalizeQuery,
  resolveDefaults,
  assertBatchable,
  withServiceFields,
} from "./query-normalizer.js";

export { chunk, chunkAsync } from "./batch-chunker.js";

// ---------------------------------------------------------------------------
// Re-exports from core
// ---------------------------------------------------------------------------

export type {
  QueryInput,
  QueryOverride,
  QuerySource,
  LocationResult,
  LocationStatus,
  EndpointClass,
  RateBudgetState,
  HttpSession,
  HttpRequest,
  HttpResponse,
} from "@ipgeo/core";

export {
  IpApiError,
  InvalidQueryError,
  UnsupportedQueryError,
  ConfigurationError,
  NetworkExhaustedError,
  TransportError,
  HttpStatusError,
  TooManyRequestsError,
  BatchTooLargeError,
  AuthError,
  InvalidResponseError,
  SessionClosedError,
  isIpApiError,
  FIELDS,
  LANGS,
  SERVICE_FIELDS,
} from "@ipgeo/core";
