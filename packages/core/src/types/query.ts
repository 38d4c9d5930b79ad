/**
 * @summary Query input shapes and the canonical query they resolve to.
 *
 * Callers may pass a bare target string or a structured override carrying
 * its own fields and language. Both are resolved into one frozen
 * `CanonicalQuery` before anything is sent.
 *
 * Used by:
 * - The query normalizer (input -> canonical)
 * - The dispatcher and endpoint router (canonical -> wire)
 */

// ---------------------------------------------------------------------------
// Caller Input
// ---------------------------------------------------------------------------

/**
 * Per-query override, matching the element shape of the batch endpoint.
 *
 * @example
 * ```typescript
 * const item: QueryOverride = { query: "8.8.8.8", fields: ["country"], lang: "de" };
 * ```
 */
export interface QueryOverride {
  /** IP address (or, on the single endpoint only, a domain name) */
  query: string;

  /** Response fields requested for this query only */
  fields?: readonly string[];

  /** Response language for this query only */
  lang?: string;
}

/**
 * Anything a caller may submit as one query.
 */
export type QueryInput = string | QueryOverride;

/**
 * Sync or async source of query inputs.
 */
export type QuerySource<T = QueryInput> = Iterable<T> | AsyncIterable<T>;

// ---------------------------------------------------------------------------
// Tagged Variant
// ---------------------------------------------------------------------------

/**
 * A bare target with no per-item structure.
 */
export interface PlainQueryItem {
  kind: "plain";
  target: string;
}

/**
 * A target carrying its own overrides.
 */
export interface OverrideQueryItem {
  kind: "override";
  target: string;
  fields?: readonly string[];
  lang?: string;
}

/**
 * Discriminated form of `QueryInput`.
 */
export type QueryItem = PlainQueryItem | OverrideQueryItem;

// ---------------------------------------------------------------------------
// Canonical Query
// ---------------------------------------------------------------------------

/**
 * Call-level defaults layered under per-item overrides.
 */
export interface QueryDefaults {
  fields?: readonly string[] | undefined;
  lang?: string | undefined;
}

/**
 * Fully resolved query, ready for transmission. Frozen once produced.
 */
export interface CanonicalQuery {
  /** IP literal or domain name */
  readonly target: string;

  /** Requested response fields, duplicate-free, service fields included */
  readonly fields: readonly string[];

  /** Response language */
  readonly lang: string;
}

/**
 * Ordered group of items sent in one batch request.
 *
 * The original input position of `queries[i]` is `offset + i`.
 */
export interface QueryBatch<T = CanonicalQuery> {
  /** Zero-based batch number */
  readonly index: number;

  /** Input position of the first item */
  readonly offset: number;

  readonly queries: readonly T[];
}
