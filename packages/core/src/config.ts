/**
 * @summary Service configuration with defaults, validation and env loading.
 *
 * Some of these values are set by the service and may change, so every one
 * of them can be overridden per client. There is no process-wide mutable
 * configuration: each client resolves its own copy.
 *
 * Used by:
 * - IpApiClient to resolve its settings
 * - The CLI to read settings from the environment
 */

import { ConfigurationError } from "./types/errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Tunable service settings.
 */
export interface IpApiConfig {
  /** Free host, HTTP unless `https` is set */
  baseUrl: string;

  /** Pro host, used whenever an API key is configured */
  proUrl: string;

  /** Path of the single-query endpoint */
  jsonEndpoint: string;

  /** Path of the batch endpoint */
  batchEndpoint: string;

  /** Maximum queries per batch request */
  batchSize: number;

  /** Documented request limit per window on the single endpoint */
  jsonRateLimit: number;

  /** Documented request limit per window on the batch endpoint */
  batchRateLimit: number;

  /** Attempts per network exchange */
  retryAttempts: number;

  /** Fixed delay between attempts in milliseconds */
  retryDelayMs: number;

  /** Margin added to the reported reset time before sending again */
  ttlHoldMs: number;

  /** Per-request timeout in milliseconds, passed to the HTTP session */
  timeoutMs: number;

  /** Use HTTPS on the free host */
  https: boolean;
}

/**
 * Default service settings.
 */
export const DEFAULT_CONFIG: Readonly<IpApiConfig> = Object.freeze({
  baseUrl: "http://ip-api.com/",
  proUrl: "https://pro.ip-api.com/",
  jsonEndpoint: "json",
  batchEndpoint: "batch",
  batchSize: 100,
  jsonRateLimit: 45,
  batchRateLimit: 15,
  retryAttempts: 3,
  retryDelayMs: 1000,
  ttlHoldMs: 3000,
  timeoutMs: 30000,
  https: false,
});

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Layer a partial configuration over the defaults and validate the result.
 * Keys that are not service settings are ignored, so a full client
 * configuration may be passed as is.
 *
 * @throws ConfigurationError naming the first invalid option
 */
export function resolveConfig(
  overrides: Partial<IpApiConfig> = {}
): IpApiConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(
      ([key, value]) => value !== undefined && key in DEFAULT_CONFIG
    )
  );
  const config: IpApiConfig = { ...DEFAULT_CONFIG, ...defined };
  validateConfig(config);
  return config;
}

/**
 * Validate a full configuration.
 *
 * @throws ConfigurationError naming the first invalid option
 */
export function validateConfig(config: IpApiConfig): void {
  assertUrl("baseUrl", config.baseUrl);
  assertUrl("proUrl", config.proUrl);
  assertNonEmpty("jsonEndpoint", config.jsonEndpoint);
  assertNonEmpty("batchEndpoint", config.batchEndpoint);
  assertPositiveInteger("batchSize", config.batchSize);
  assertPositiveInteger("jsonRateLimit", config.jsonRateLimit);
  assertPositiveInteger("batchRateLimit", config.batchRateLimit);
  assertPositiveInteger("retryAttempts", config.retryAttempts);
  assertNonNegative("retryDelayMs", config.retryDelayMs);
  assertNonNegative("ttlHoldMs", config.ttlHoldMs);
  assertPositive("timeoutMs", config.timeoutMs);
  if (typeof config.https !== "boolean") {
    throw new ConfigurationError("https", config.https, "must be a boolean");
  }
}

/**
 * Check that a value is an integer >= 1.
 *
 * @throws ConfigurationError otherwise
 */
export function assertPositiveInteger(option: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(option, value, "must be an integer >= 1");
  }
}

function assertPositive(option: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(option, value, "must be a finite number > 0");
  }
}

function assertNonNegative(option: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(option, value, "must be a finite number >= 0");
  }
}

function assertNonEmpty(option: string, value: string): void {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigurationError(option, value, "must be a non-empty string");
  }
}

function assertUrl(option: string, value: string): void {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigurationError(option, value, "must be an absolute URL");
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigurationError(option, value, "must use http or https");
  }
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

/**
 * Settings read from the environment, on top of the service settings.
 */
export interface EnvConfig extends Partial<IpApiConfig> {
  key?: string;
  lang?: string;
  fields?: string[];
  debug?: boolean;
}

/**
 * Read settings from environment variables.
 *
 * Recognised variables: IPGEO_KEY, IPGEO_LANG, IPGEO_FIELDS (comma
 * separated), IPGEO_HTTPS, IPGEO_BATCH_SIZE, IPGEO_RETRY_ATTEMPTS,
 * IPGEO_RETRY_DELAY_MS, IPGEO_TIMEOUT_MS, IPGEO_DEBUG. Unset or empty
 * variables are left out.
 *
 * @throws ConfigurationError when a numeric or boolean variable is malformed
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env
): EnvConfig {
  const config: EnvConfig = {};

  const key = nonEmpty(env["IPGEO_KEY"]);
  if (key !== undefined) {
    config.key = key;
  }
  const lang = nonEmpty(env["IPGEO_LANG"]);
  if (lang !== undefined) {
    config.lang = lang;
  }
  const fields = nonEmpty(env["IPGEO_FIELDS"]);
  if (fields !== undefined) {
    config.fields = parseCommaSeparated(fields);
  }

  const https = parseBoolean("IPGEO_HTTPS", env["IPGEO_HTTPS"]);
  if (https !== undefined) {
    config.https = https;
  }
  const debug = parseBoolean("IPGEO_DEBUG", env["IPGEO_DEBUG"]);
  if (debug !== undefined) {
    config.debug = debug;
  }

  const batchSize = parseNumber("IPGEO_BATCH_SIZE", env["IPGEO_BATCH_SIZE"]);
  if (batchSize !== undefined) {
    config.batchSize = batchSize;
  }
  const retryAttempts = parseNumber("IPGEO_RETRY_ATTEMPTS", env["IPGEO_RETRY_ATTEMPTS"]);
  if (retryAttempts !== undefined) {
    config.retryAttempts = retryAttempts;
  }
  const retryDelayMs = parseNumber("IPGEO_RETRY_DELAY_MS", env["IPGEO_RETRY_DELAY_MS"]);
  if (retryDelayMs !== undefined) {
    config.retryDelayMs = retryDelayMs;
  }
  const timeoutMs = parseNumber("IPGEO_TIMEOUT_MS", env["IPGEO_TIMEOUT_MS"]);
  if (timeoutMs !== undefined) {
    config.timeoutMs = timeoutMs;
  }

  return config;
}

/**
 * Split a comma separated list, dropping blanks.
 */
export function parseCommaSeparated(value: string): string[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "");
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed === "" ? undefined : trimmed;
}

function parseBoolean(name: string, value: string | undefined): boolean | undefined {
  const raw = nonEmpty(value)?.toLowerCase();
  if (raw === undefined) {
    return undefined;
  }
  if (raw === "1" || raw === "true" || raw === "yes") {
    return true;
  }
  if (raw === "0" || raw === "false" || raw === "no") {
    return false;
  }
  throw new ConfigurationError(name, value, "must be true/false, yes/no or 1/0");
}

function parseNumber(name: string, value: string | undefined): number | undefined {
  const raw = nonEmpty(value);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(name, value, "must be a number");
  }
  return parsed;
}
