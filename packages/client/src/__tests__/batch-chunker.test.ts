/**
 * @summary Tests for batch splitting of arrays and lazy sources.
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@ipgeo/core';
import { chunk, chunkAsync } from '../batch-chunker.js';

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

describe('chunk', () => {
  it('splits into ordered batches with offsets', () => {
    expect(chunk(['a', 'b', 'c', 'd', 'e'], 2)).toEqual([
      { index: 0, offset: 0, queries: ['a', 'b'] },
      { index: 1, offset: 2, queries: ['c', 'd'] },
      { index: 2, offset: 4, queries: ['e'] },
    ]);
  });

  it('returns one batch for a short input', () => {
    expect(chunk(['a', 'b'], 100)).toEqual([{ index: 0, offset: 0, queries: ['a', 'b'] }]);
  });

  it('returns no batch for an empty input', () => {
    expect(chunk([], 3)).toEqual([]);
  });

  it('produces ceil(n / size) batches', () => {
    const items = Array.from({ length: 250 }, (_, i) => i);
    const batches = chunk(items, 100);

    expect(batches.map((batch) => batch.queries.length)).toEqual([100, 100, 50]);
    expect(batches.flatMap((batch) => batch.queries)).toEqual(items);
  });

  it('rejects sizes below one', () => {
    expect(() => chunk(['a'], 0)).toThrow(ConfigurationError);
    expect(() => chunk(['a'], 1.5)).toThrow(ConfigurationError);
  });
});

describe('chunkAsync', () => {
  it('splits sync iterables', async () => {
    const batches = await collect(chunkAsync(new Set(['a', 'b', 'c']), 2));

    expect(batches).toEqual([
      { index: 0, offset: 0, queries: ['a', 'b'] },
      { index: 1, offset: 2, queries: ['c'] },
    ]);
  });

  it('splits async iterables', async () => {
    async function* source() {
      yield 'a';
      yield 'b';
    }

    expect(await collect(chunkAsync(source(), 1))).toEqual([
      { index: 0, offset: 0, queries: ['a'] },
      { index: 1, offset: 1, queries: ['b'] },
    ]);
  });

  it('yields a full batch before pulling further items', async () => {
    const pulled: string[] = [];
    function* source() {
      for (const item of ['a', 'b', 'c']) {
        pulled.push(item);
        yield item;
      }
    }

    const batches = chunkAsync(source(), 2);
    const first = await batches.next();

    expect(first.value).toEqual({ index: 0, offset: 0, queries: ['a', 'b'] });
    expect(pulled).toEqual(['a', 'b']);
  });

  it('yields nothing for an empty source', async () => {
    expect(await collect(chunkAsync([], 5))).toEqual([]);
  });

  it('checks the size on the first pull', async () => {
    await expect(chunkAsync(['a'], 0).next()).rejects.toThrow(ConfigurationError);
  });
});
