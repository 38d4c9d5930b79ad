/**
 * @summary IpApiClient, the composition root of the SDK.
 *
 * This module wires the configuration, HTTP session, rate budget tracker,
 * retrying transport, endpoint router and dispatcher into one client and
 * exposes the public lookup surface:
 *
 * - `location()` looks up the caller's own address
 * - `location("8.8.8.8")` uses the single endpoint (domain names allowed)
 * - `location({ query, fields, lang })` sends a batch of one
 * - `location(iterable)` batches the whole collection, in input order
 * - `locationStream(source)` yields results lazily, one batch at a time
 *
 * It also provides one-shot helpers that create a client, run one lookup
 * and close the client on every exit path.
 *
 * Used by:
 * - Application code looking up IP geolocation data
 * - The ipgeo CLI
 */

import type {
  EndpointClass,
  HttpSession,
  IpApiConfig,
  LocationResult,
  Logger,
  QueryDefaults,
  QueryInput,
  QueryOverride,
  QuerySource,
  RateBudgetState,
  SleepFn,
} from "@ipgeo/core";
import {
  ConfigurationError,
  InvalidResponseError,
  SessionClosedError,
  createConsoleLogger,
  resolveConfig,
} from "@ipgeo/core";

import { Dispatcher, type DispatchOptions } from "./dispatcher.js";
import { EndpointRouter } from "./endpoint-router.js";
import { FetchSession } from "./http-session.js";
import {
  assertBatchable,
  normalizeQuery,
  resolveDefaults,
} from "./query-normalizer.js";
import {
  RateBudgetTracker,
  type RateBudgetTrackerOptions,
} from "./rate-budget-tracker.js";
import { RetryingTransport, type RetryOptions } from "./retry-logic.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Configuration for IpApiClient.
 *
 * Every service setting of `IpApiConfig` may be overridden; the rest have
 * defaults.
 */
export interface IpApiClientConfig extends Partial<IpApiConfig> {
  /**
   * Response fields requested when a call does not name its own.
   * The service fields `status`, `message` and `query` are always added.
   */
  fields?: readonly string[];

  /**
   * Response language when a call does not name its own.
   * @default "en"
   */
  lang?: string;

  /**
   * API key. Switches to the pro host over HTTPS and disables
   * rate-limit waits.
   */
  key?: string;

  /**
   * HTTP session to use. A supplied session is never closed by the client.
   * @default a new FetchSession owned by the client
   */
  session?: HttpSession;

  /**
   * Logger for rate-limit waits, retries and degraded batches.
   * @default console logger prefixed "IpApiClient"
   */
  logger?: Logger;

  /**
   * Emit debug lines on the default logger.
   * @default false
   */
  debug?: boolean;

  /**
   * Callback invoked before each network retry.
   */
  onRetry?: RetryOptions["onRetry"];

  /**
   * Callback invoked before each rate-limit wait.
   */
  onRateLimitWait?: RateBudgetTrackerOptions["onWait"];

  /**
   * Suspension function for retry delays and rate-limit waits.
   */
  sleep?: SleepFn;
}

/**
 * Per-call lookup options, layered over the client's defaults.
 */
export interface LocationOptions {
  /** Response fields for this call */
  fields?: readonly string[];

  /** Response language for this call */
  lang?: string;

  /** Stops further exchanges once aborted */
  signal?: AbortSignal | undefined;
}

/**
 * Options of the one-shot helpers: client configuration plus a signal.
 */
export interface OneShotOptions extends IpApiClientConfig {
  signal?: AbortSignal | undefined;
}

// ---------------------------------------------------------------------------
// IpApiClient
// ---------------------------------------------------------------------------

/**
 * Client for the ip-api.com geolocation service.
 *
 * Each client has its own configuration and its own rate budgets, so two
 * clients never share state.
 *
 * @example
 * ```typescript
 * import { IpApiClient } from "@ipgeo/client";
 *
 * const client = new IpApiClient({ fields: ["country", "city"], lang: "de" });
 * try {
 *   const one = await client.location("8.8.8.8");
 *   const many = await client.location(["1.1.1.1", { query: "8.8.4.4", lang: "fr" }]);
 *
 *   for await (const result of client.locationStream(readAddresses())) {
 *     console.log(result.query, result.status);
 *   }
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export class IpApiClient {
  private readonly config: IpApiConfig;
  private readonly defaults: QueryDefaults;
  private readonly session: HttpSession;
  private readonly ownsSession: boolean;
  private readonly tracker: RateBudgetTracker;
  private readonly dispatcher: Dispatcher;
  private readonly logger: Logger;
  private isClosed = false;

  /**
   * Create a new IpApiClient.
   *
   * @param config - Client configuration
   * @throws ConfigurationError when a setting is invalid
   */
  constructor(config: IpApiClientConfig = {}) {
    this.config = resolveConfig(config);
    const key = resolveKey(config.key);

    const defaults: QueryDefaults = {};
    if (config.fields !== undefined) {
      defaults.fields = config.fields;
    }
    if (config.lang !== undefined) {
      defaults.lang = config.lang;
    }
    this.defaults = resolveDefaults(defaults);

    this.logger =
      config.logger ?? createConsoleLogger("IpApiClient", { debug: config.debug ?? false });

    if (config.session !== undefined) {
      this.session = config.session;
      this.ownsSession = false;
    } else {
      this.session = new FetchSession({ timeout: this.config.timeoutMs });
      this.ownsSession = true;
    }

    const trackerOptions: RateBudgetTrackerOptions = {
      hasKey: key !== undefined,
      ttlHoldMs: this.config.ttlHoldMs,
      limits: {
        single: this.config.jsonRateLimit,
        batch: this.config.batchRateLimit,
      },
      logger: this.logger,
    };
    const retryOptions: RetryOptions = { logger: this.logger };
    if (config.sleep !== undefined) {
      trackerOptions.sleep = config.sleep;
      retryOptions.sleep = config.sleep;
    }
    if (config.onRateLimitWait !== undefined) {
      trackerOptions.onWait = config.onRateLimitWait;
    }
    if (config.onRetry !== undefined) {
      retryOptions.onRetry = config.onRetry;
    }

    this.tracker = new RateBudgetTracker(trackerOptions);

    const router = new EndpointRouter({ ...this.config, key });
    this.dispatcher = new Dispatcher({
      transport: new RetryingTransport(
        this.session,
        { maxAttempts: this.config.retryAttempts, delayMs: this.config.retryDelayMs },
        retryOptions
      ),
      tracker: this.tracker,
      router,
      batchSize: this.config.batchSize,
      hasKey: key !== undefined,
      logger: this.logger,
    });

    this.logger.debug(`Using ${router.baseUrl} (batch size ${this.config.batchSize})`);
  }

  // -------------------------------------------------------------------------
  // Lookups
  // -------------------------------------------------------------------------

  /**
   * Look up the caller's own address.
   */
  location(target?: undefined, options?: LocationOptions): Promise<LocationResult>;

  /**
   * Look up one target. A bare string goes to the single endpoint and may
   * be a domain name; an override object goes to the batch endpoint.
   *
   * @throws InvalidQueryError when the target is malformed
   * @throws UnsupportedQueryError when an override holds a domain name
   */
  location(target: QueryInput, options?: LocationOptions): Promise<LocationResult>;

  /**
   * Look up a collection of targets through the batch endpoint.
   *
   * Malformed items get a `fail` result in their slot. Sync collections are
   * checked for domain names before any request is sent.
   *
   * @returns One result per target, in input order
   * @throws UnsupportedQueryError when a target is a domain name
   */
  location(
    targets: QuerySource<QueryInput>,
    options?: LocationOptions
  ): Promise<LocationResult[]>;

  async location(
    target?: QueryInput | QuerySource<QueryInput>,
    options: LocationOptions = {}
  ): Promise<LocationResult | LocationResult[]> {
    this.assertOpen();
    const defaults = this.callDefaults(options);
    const dispatchOptions: DispatchOptions = { signal: options.signal };

    if (target === undefined || typeof target === "string") {
      return this.dispatcher.locateOne(target, defaults, dispatchOptions);
    }

    if (isQuerySource(target)) {
      return this.dispatcher.locateMany(target, defaults, dispatchOptions);
    }

    const query = normalizeQuery(target, defaults);
    assertBatchable(query);
    const [result] = await this.dispatcher.dispatchBatch(
      [query],
      resolveDefaults(defaults).lang,
      dispatchOptions
    );
    if (result === undefined) {
      throw new InvalidResponseError("Batch endpoint returned no result");
    }
    return result;
  }

  /**
   * Lazily look up a sync or async source through the batch endpoint.
   *
   * The source is pulled one batch at a time, and the next batch is only
   * sent once every result of the previous one has been consumed. Breaking
   * out of the loop sends nothing more.
   *
   * @throws SessionClosedError when the client is closed
   * @throws ConfigurationError when the call options are invalid
   */
  locationStream(
    source: QuerySource<QueryInput>,
    options: LocationOptions = {}
  ): AsyncGenerator<LocationResult, void, undefined> {
    this.assertOpen();
    const defaults = this.callDefaults(options);
    return this.dispatcher.dispatchStream(source, defaults, { signal: options.signal });
  }

  // -------------------------------------------------------------------------
  // State
  // -------------------------------------------------------------------------

  /**
   * Last known rate budget of an endpoint class.
   *
   * @returns State, or undefined before the first response
   */
  rateBudget(endpointClass: EndpointClass): RateBudgetState | undefined {
    return this.tracker.snapshot(endpointClass);
  }

  /**
   * Whether `close()` was called.
   */
  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Release the session if the client owns it. Idempotent; later lookups
   * throw `SessionClosedError`.
   */
  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    if (this.ownsSession) {
      await this.session.close();
    }
  }

  private assertOpen(): void {
    if (this.isClosed) {
      throw new SessionClosedError("IpApiClient is closed");
    }
  }

  private callDefaults(options: LocationOptions): QueryDefaults {
    return resolveDefaults({
      fields: options.fields ?? this.defaults.fields,
      lang: options.lang ?? this.defaults.lang,
    });
  }
}

// ---------------------------------------------------------------------------
// Factory and Scoped Helpers
// ---------------------------------------------------------------------------

/**
 * Create an IpApiClient instance.
 *
 * @param config - Client configuration
 * @returns IpApiClient instance
 */
export function createIpApiClient(config: IpApiClientConfig = {}): IpApiClient {
  return new IpApiClient(config);
}

/**
 * Run `fn` with a fresh client and close it afterwards, whatever happens.
 *
 * @example
 * ```typescript
 * const results = await withIpApiClient({ lang: "de" }, async (client) => {
 *   const first = await client.location(["1.1.1.1", "8.8.8.8"]);
 *   const second = await client.location(["9.9.9.9"]);
 *   return [...first, ...second];
 * });
 * ```
 */
export async function withIpApiClient<T>(
  config: IpApiClientConfig,
  fn: (client: IpApiClient) => Promise<T> | T
): Promise<T> {
  const client = new IpApiClient(config);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}

/**
 * One-shot lookup of the caller's own address.
 */
export function location(target?: undefined, options?: OneShotOptions): Promise<LocationResult>;

/**
 * One-shot lookup of one target.
 */
export function location(target: QueryInput, options?: OneShotOptions): Promise<LocationResult>;

/**
 * One-shot lookup of a collection of targets.
 */
export function location(
  targets: QuerySource<QueryInput>,
  options?: OneShotOptions
): Promise<LocationResult[]>;

export function location(
  target?: QueryInput | QuerySource<QueryInput>,
  options: OneShotOptions = {}
): Promise<LocationResult | LocationResult[]> {
  const callOptions: LocationOptions = { signal: options.signal };

  return withIpApiClient<LocationResult | LocationResult[]>(options, (client) => {
    if (target === undefined) {
      return client.location(undefined, callOptions);
    }
    if (typeof target === "string" || !isQuerySource(target)) {
      return client.location(target, callOptions);
    }
    return client.location(target, callOptions);
  });
}

/**
 * One-shot streamed lookup. The client is created on the first pull and
 * closed when the stream ends, fails or is abandoned early.
 *
 * @example
 * ```typescript
 * for await (const result of locationStream(readAddresses(), { lang: "es" })) {
 *   if (result.status === "fail") break;
 * }
 * ```
 */
export async function* locationStream(
  source: QuerySource<QueryInput>,
  options: OneShotOptions = {}
): AsyncGenerator<LocationResult, void, undefined> {
  const client = new IpApiClient(options);
  try {
    yield* client.locationStream(source, { signal: options.signal });
  } finally {
    await client.close();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Whether a lookup target is a collection rather than one override.
 */
export function isQuerySource(
  value: QueryOverride | QuerySource<QueryInput>
): value is QuerySource<QueryInput> {
  return Symbol.iterator in value || Symbol.asyncIterator in value;
}

function resolveKey(key: unknown): string | undefined {
  if (key === undefined) {
    return undefined;
  }
  if (typeof key !== "string" || key.trim() === "") {
    throw new ConfigurationError("key", key, "must be a non-empty string");
  }
  return key.trim();
}
