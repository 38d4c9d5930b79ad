/**
 * @summary Main entry point for @ipgeo/core package.
 *
 * This package provides the types, constants, configuration and error
 * taxonomy shared by the ip-api.com client and CLI. It has no third-party
 * runtime dependencies.
 *
 * Usage:
 * ```typescript
 * import {
 *   DEFAULT_CONFIG,
 *   resolveConfig,
 *   InvalidQueryError,
 *   type LocationResult,
 * } from "@ipgeo/core";
 * ```
 *
 * Subpath exports:
 * - @ipgeo/core/types - Type definitions and errors only
 * - @ipgeo/core/utils - Utility functions only
 */

// ---------------------------------------------------------------------------
// Type Exports
// ---------------------------------------------------------------------------

// Query types
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
} from "./types/query.js";

// Result types
export type { LocationStatus, LocationResult } from "./types/result.js";
export { isLocationResult, failedResult } from "./types/result.js";

// Rate limit types
export type {
  EndpointClass,
  RateBudgetState,
  RetryPolicy,
} from "./types/rate-limit.js";

// HTTP session types
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpSession,
} from "./types/http.js";

// Header constants
export {
  RATE_LIMIT_HEADERS,
  type RateLimitHeaderName,
} from "./types/headers.js";

// Error types
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
} from "./types/errors.js";

// ---------------------------------------------------------------------------
// Constants and Configuration
// ---------------------------------------------------------------------------

export {
  FIELDS,
  SERVICE_FIELDS,
  DEFAULT_FIELDS,
  LANGS,
  DEFAULT_LANG,
} from "./constants.js";

export {
  DEFAULT_CONFIG,
  resolveConfig,
  validateConfig,
  assertPositiveInteger,
  configFromEnv,
  parseCommaSeparated,
  type IpApiConfig,
  type EnvConfig,
} from "./config.js";

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

export {
  isIpAddress,
  isDomainName,
  sleep,
  createConsoleLogger,
  silentLogger,
  type SleepFn,
  type Logger,
  type ConsoleLoggerOptions,
} from "./utils/index.js";

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

/**
 * Package version.
 */
export const VERSION = "0.1.0";
