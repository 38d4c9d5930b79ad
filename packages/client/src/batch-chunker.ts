/**
 * @summary Splits ordered query sequences into batch-sized groups.
 *
 * Batch *i* holds the items at positions `[i * maxSize, (i + 1) * maxSize)`,
 * so concatenating every batch reproduces the input exactly. The async
 * variant pulls from its source one batch at a time and only pulls again
 * when the consumer asks for the next batch, which bounds memory for large
 * or endless sources and lets a slow consumer hold back the producer.
 *
 * Routing a lone query to the single-query endpoint is not decided here:
 * a one-item input still yields exactly one batch.
 *
 * Used by:
 * - Dispatcher, for collected and streamed batch lookups
 */

import type { QueryBatch, QuerySource } from "@ipgeo/core";
import { assertPositiveInteger } from "@ipgeo/core";

/**
 * Split an in-memory sequence into batches.
 *
 * @param items - Ordered items
 * @param maxSize - Maximum items per batch, an integer >= 1
 * @returns Batches in input order
 * @throws ConfigurationError when maxSize is not an integer >= 1
 *
 * @example
 * ```typescript
 * chunk(["a", "b", "c"], 2).map((batch) => batch.queries);
 * // [["a", "b"], ["c"]]
 * ```
 */
export function chunk<T>(items: readonly T[], maxSize: number): QueryBatch<T>[] {
  assertPositiveInteger("batchSize", maxSize);

  const batches: QueryBatch<T>[] = [];
  for (let offset = 0; offset < items.length; offset += maxSize) {
    batches.push({
      index: batches.length,
      offset,
      queries: items.slice(offset, offset + maxSize),
    });
  }
  return batches;
}

/**
 * Lazily split a sync or async source into batches.
 *
 * The size check runs on the first pull, before the source is touched.
 *
 * @param source - Iterable or async iterable of items
 * @param maxSize - Maximum items per batch, an integer >= 1
 * @yields Batches in input order; the last one may be shorter
 * @throws ConfigurationError when maxSize is not an integer >= 1
 */
export async function* chunkAsync<T>(
  source: QuerySource<T>,
  maxSize: number
): AsyncGenerator<QueryBatch<T>, void, undefined> {
  assertPositiveInteger("batchSize", maxSize);

  let index = 0;
  let offset = 0;
  let pending: T[] = [];

  for await (const item of source) {
    pending.push(item);
    if (pending.length === maxSize) {
      const queries = pending;
      pending = [];
      yield { index, offset, queries };
      index += 1;
      offset += queries.length;
    }
  }

  if (pending.length > 0) {
    yield { index, offset, queries: pending };
  }
}
