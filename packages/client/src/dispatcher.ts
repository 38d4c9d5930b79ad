/**
 * @summary Query dispatch: routing, batching, rate gating and decoding.
 *
 * The dispatcher drives every lookup. A lone bare target (or no target at
 * all) goes to the single-query endpoint, which also resolves domain names.
 * Everything else goes to the batch endpoint:
 *
 * 1. Pull one batch of raw inputs from the source
 * 2. Normalize each; a malformed item becomes a `fail` result in its slot
 * 3. Refuse the batch if it holds a domain name, before anything is sent
 * 4. Wait out a spent rate budget
 * 5. Exchange, retrying transport failures
 * 6. Record the reported budget, whatever the outcome
 * 7. Check the HTTP status and decode the positional result array
 * 8. Yield the batch's results in order, then pull the next batch
 *
 * Only one batch is in flight and the source is not pulled again until
 * the previous batch's results have been consumed.
 *
 * Used by:
 * - IpApiClient for `location()` and `locationStream()`
 */

import type {
  CanonicalQuery,
  EndpointClass,
  HttpRequest,
  HttpResponse,
  LocationResult,
  QueryBatch,
  QueryDefaults,
  QuerySource,
} from "@ipgeo/core";
import {
  AuthError,
  BatchTooLargeError,
  HttpStatusError,
  InvalidQueryError,
  InvalidResponseError,
  TooManyRequestsError,
  failedResult,
  isLocationResult,
  silentLogger,
} from "@ipgeo/core";
import type { Logger } from "@ipgeo/core";

import { chunk, chunkAsync } from "./batch-chunker.js";
import type { EndpointRouter, SingleQuery } from "./endpoint-router.js";
import {
  assertBatchable,
  normalizeQuery,
  resolveDefaults,
} from "./query-normalizer.js";
import type { RateBudgetTracker } from "./rate-budget-tracker.js";
import type { RetryingTransport } from "./retry-logic.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Collaborators of the dispatcher.
 */
export interface DispatcherConfig {
  transport: RetryingTransport;
  tracker: RateBudgetTracker;
  router: EndpointRouter;

  /** Maximum queries per batch request */
  batchSize: number;

  /** Whether an API key is configured */
  hasKey: boolean;

  logger?: Logger;
}

/**
 * Per-call dispatch options.
 */
export interface DispatchOptions {
  /** Stops further exchanges once aborted */
  signal?: AbortSignal | undefined;
}

/**
 * Message of the results degraded by an HTTP 429 without an API key.
 */
export const TOO_MANY_REQUESTS_MESSAGE = "too many requests";

// ---------------------------------------------------------------------------
// Dispatcher
// ---------------------------------------------------------------------------

export class Dispatcher {
  private readonly transport: RetryingTransport;
  private readonly tracker: RateBudgetTracker;
  private readonly router: EndpointRouter;
  private readonly batchSize: number;
  private readonly hasKey: boolean;
  private readonly logger: Logger;

  constructor(config: DispatcherConfig) {
    this.transport = config.transport;
    this.tracker = config.tracker;
    this.router = config.router;
    this.batchSize = config.batchSize;
    this.hasKey = config.hasKey;
    this.logger = config.logger ?? silentLogger;
  }

  // -------------------------------------------------------------------------
  // Routing
  // -------------------------------------------------------------------------

  /**
   * Look up one bare target on the single endpoint; no target looks up the
   * caller's own address.
   *
   * @throws InvalidQueryError when the target is empty
   */
  locateOne(
    target: string | undefined,
    defaults: QueryDefaults,
    options?: DispatchOptions
  ): Promise<LocationResult> {
    if (target === undefined) {
      return this.dispatchOne(resolveDefaults(defaults), options);
    }
    return this.dispatchOne(normalizeQuery(target, defaults), options);
  }

  /**
   * Look up a collection of inputs and gather the results in input order.
   *
   * Sync collections are read in full and checked for domain names before
   * the first exchange; async sources are checked batch by batch as they
   * are pulled.
   *
   * @throws UnsupportedQueryError when an input is a domain name
   * @throws NetworkExhaustedError when a batch exchange keeps failing
   */
  async locateMany(
    source: QuerySource<unknown>,
    defaults: QueryDefaults,
    options: DispatchOptions = {}
  ): Promise<LocationResult[]> {
    const results: LocationResult[] = [];

    if (isSyncIterable(source)) {
      const items: readonly unknown[] = Array.isArray(source) ? source : [...source];
      const { lang } = resolveDefaults(defaults);
      this.checkBatchable(items, defaults);
      for (const batch of chunk(items, this.batchSize)) {
        options.signal?.throwIfAborted();
        results.push(...(await this.processBatch(batch, defaults, lang, options)));
      }
      return results;
    }

    for await (const result of this.dispatchStream(source, defaults, options)) {
      results.push(result);
    }
    return results;
  }

  // -------------------------------------------------------------------------
  // Dispatch
  // -------------------------------------------------------------------------

  /**
   * Exchange one query with the single endpoint.
   */
  async dispatchOne(
    query: SingleQuery,
    options: DispatchOptions = {}
  ): Promise<LocationResult> {
    const request = this.router.singleRequest(query, options.signal);
    const response = await this.exchange("single", request);

    if (this.isDegraded(response)) {
      this.logger.warn("Too many requests (429) on the single endpoint");
      return failedResult(query.target ?? "", TOO_MANY_REQUESTS_MESSAGE);
    }
    assertOkStatus(response.status);

    if (!isLocationResult(response.body)) {
      throw new InvalidResponseError(
        "Single endpoint returned a body without a valid status field"
      );
    }
    return response.body;
  }

  /**
   * Exchange one batch of canonical queries with the batch endpoint.
   *
   * @param queries - At most `batchSize` queries
   * @param lang - Call-level language
   * @returns One result per query, positionally aligned
   */
  async dispatchBatch(
    queries: readonly CanonicalQuery[],
    lang: string,
    options: DispatchOptions = {}
  ): Promise<LocationResult[]> {
    if (queries.length === 0) {
      return [];
    }

    const request = this.router.batchRequest(queries, lang, options.signal);
    const response = await this.exchange("batch", request);

    if (this.isDegraded(response)) {
      this.logger.warn(
        `Too many requests (429) on the batch endpoint; ` +
          `marking ${queries.length} queries as failed`
      );
      return queries.map((query) => failedResult(query.target, TOO_MANY_REQUESTS_MESSAGE));
    }
    assertOkStatus(response.status, queries.length);

    return decodeBatch(response.body, queries.length);
  }

  /**
   * Lazily look up a sync or async source, one batch at a time.
   *
   * @yields One result per input, in input order
   * @throws UnsupportedQueryError before sending a batch holding a domain name
   * @throws NetworkExhaustedError when a batch exchange keeps failing
   */
  async *dispatchStream(
    source: QuerySource<unknown>,
    defaults: QueryDefaults = {},
    options: DispatchOptions = {}
  ): AsyncGenerator<LocationResult, void, undefined> {
    const { lang } = resolveDefaults(defaults);

    for await (const batch of chunkAsync(source, this.batchSize)) {
      options.signal?.throwIfAborted();
      yield* await this.processBatch(batch, defaults, lang, options);
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /**
   * Normalize, check and send one batch of raw inputs, then merge the
   * service's results with the slots of malformed inputs.
   */
  private async processBatch(
    batch: QueryBatch<unknown>,
    defaults: QueryDefaults,
    lang: string,
    options: DispatchOptions
  ): Promise<LocationResult[]> {
    const slots: (LocationResult | number)[] = [];
    const queries: CanonicalQuery[] = [];

    for (const raw of batch.queries) {
      let query: CanonicalQuery;
      try {
        query = normalizeQuery(raw, defaults);
      } catch (error) {
        if (!(error instanceof InvalidQueryError)) {
          throw error;
        }
        this.logger.debug(
          `Query #${batch.offset + slots.length} is invalid: ${error.message}`
        );
        slots.push(failedResult(echoTarget(raw), error.message));
        continue;
      }
      assertBatchable(query);
      slots.push(queries.length);
      queries.push(query);
    }

    const results = await this.dispatchBatch(queries, lang, options);

    return slots.map((slot) => {
      if (typeof slot !== "number") {
        return slot;
      }
      const result = results[slot];
      if (result === undefined) {
        throw new InvalidResponseError(`Missing result for query #${batch.offset + slot}`);
      }
      return result;
    });
  }

  /**
   * Check an in-memory collection for domain names before any exchange.
   * Malformed items are left for `processBatch` to turn into `fail` results.
   */
  private checkBatchable(items: readonly unknown[], defaults: QueryDefaults): void {
    for (const raw of items) {
      let query: CanonicalQuery;
      try {
        query = normalizeQuery(raw, defaults);
      } catch (error) {
        if (error instanceof InvalidQueryError) {
          continue;
        }
        throw error;
      }
      assertBatchable(query);
    }
  }

  /**
   * Rate-gated, retried exchange. The reported budget is recorded for
   * every completed exchange, whatever its status.
   */
  private async exchange(
    endpointClass: EndpointClass,
    request: HttpRequest
  ): Promise<HttpResponse> {
    await this.tracker.waitIfNeeded(endpointClass);
    const response = await this.transport.exchange(request);
    this.tracker.observe(endpointClass, response.headers);
    return response;
  }

  private isDegraded(response: HttpResponse): boolean {
    return response.status === 429 && !this.hasKey;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Map a non-200 status to its error.
 *
 * @param status - HTTP status
 * @param batchSize - Queries sent, for batch requests
 */
export function assertOkStatus(status: number, batchSize?: number): void {
  if (status === 200) {
    return;
  }
  if (status === 429) {
    throw new TooManyRequestsError();
  }
  if (status === 403) {
    throw new AuthError();
  }
  if (status === 422 && batchSize !== undefined) {
    throw new BatchTooLargeError(batchSize);
  }
  throw new HttpStatusError(status);
}

/**
 * Decode a batch response body.
 *
 * @throws InvalidResponseError unless the body is an array of `expected`
 *   location records
 */
export function decodeBatch(body: unknown, expected: number): LocationResult[] {
  if (!Array.isArray(body)) {
    throw new InvalidResponseError("Batch endpoint did not return an array");
  }
  const items: readonly unknown[] = body;
  if (items.length !== expected) {
    throw new InvalidResponseError(
      `Batch endpoint returned ${items.length} results for ${expected} queries`
    );
  }

  const results: LocationResult[] = [];
  for (const [position, item] of items.entries()) {
    if (!isLocationResult(item)) {
      throw new InvalidResponseError(
        `Batch result #${position} has no valid status field`
      );
    }
    results.push(item);
  }
  return results;
}

function isSyncIterable<T>(source: QuerySource<T>): source is Iterable<T> {
  return Symbol.iterator in source;
}

/**
 * Best-effort target of a raw input, echoed in `fail` results.
 */
function echoTarget(raw: unknown): string {
  if (typeof raw === "string") {
    return raw;
  }
  if (typeof raw === "object" && raw !== null && "query" in raw && typeof raw.query === "string") {
    return raw.query;
  }
  return "";
}
