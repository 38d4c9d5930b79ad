/**
 * @summary Tests for query tagging and normalization.
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DEFAULT_FIELDS,
  InvalidQueryError,
  UnsupportedQueryError,
} from '@ipgeo/core';
import {
  assertBatchable,
  isPlainQuery,
  normalizeQuery,
  resolveDefaults,
  toQueryItem,
  withServiceFields,
} from '../query-normalizer.js';

describe('toQueryItem', () => {
  it('tags bare strings as plain', () => {
    expect(toQueryItem(' 8.8.8.8 ')).toEqual({ kind: 'plain', target: '8.8.8.8' });
  });

  it('tags objects as overrides', () => {
    expect(toQueryItem({ query: '1.1.1.1', lang: 'de' })).toEqual({
      kind: 'override',
      target: '1.1.1.1',
      lang: 'de',
    });
  });

  it.each([
    ['an empty string', ''],
    ['a blank string', '   '],
    ['a number', 42],
    ['null', null],
    ['an array', ['8.8.8.8']],
    ['an object without query', { fields: ['country'] }],
    ['a non-string query', { query: 1 }],
    ['an empty query', { query: '' }],
    ['non-array fields', { query: '8.8.8.8', fields: 'country' }],
    ['blank field names', { query: '8.8.8.8', fields: ['country', ' '] }],
    ['a non-string lang', { query: '8.8.8.8', lang: 5 }],
  ])('rejects %s', (_label, input) => {
    expect(() => toQueryItem(input)).toThrow(InvalidQueryError);
  });
});

describe('isPlainQuery', () => {
  it('distinguishes bare targets from overrides', () => {
    expect(isPlainQuery('8.8.8.8')).toBe(true);
    expect(isPlainQuery({ kind: 'plain', target: '8.8.8.8' })).toBe(true);
    expect(isPlainQuery({ query: '8.8.8.8' })).toBe(false);
    expect(isPlainQuery({ kind: 'override', target: '8.8.8.8' })).toBe(false);
  });
});

describe('normalizeQuery', () => {
  it('uses the service defaults when nothing is given', () => {
    expect(normalizeQuery('8.8.8.8')).toEqual({
      target: '8.8.8.8',
      fields: [...DEFAULT_FIELDS],
      lang: 'en',
    });
  });

  it('applies call defaults to plain items', () => {
    expect(normalizeQuery('8.8.8.8', { fields: ['country'], lang: 'fr' })).toEqual({
      target: '8.8.8.8',
      fields: ['country', 'status', 'message', 'query'],
      lang: 'fr',
    });
  });

  it('lets item overrides win over call defaults', () => {
    const query = normalizeQuery(
      { query: '1.1.1.1', fields: ['city', 'city'], lang: 'de' },
      { fields: ['country'], lang: 'fr' }
    );

    expect(query).toEqual({
      target: '1.1.1.1',
      fields: ['city', 'status', 'message', 'query'],
      lang: 'de',
    });
  });

  it('falls back per property', () => {
    const query = normalizeQuery({ query: '1.1.1.1', lang: 'ja' }, { fields: ['country'] });

    expect(query.fields).toEqual(['country', 'status', 'message', 'query']);
    expect(query.lang).toBe('ja');
  });

  it('freezes the result', () => {
    const query = normalizeQuery({ query: '1.1.1.1', fields: ['lat'] });

    expect(Object.isFrozen(query)).toBe(true);
    expect(Object.isFrozen(query.fields)).toBe(true);
  });

  it('accepts already tagged items', () => {
    expect(normalizeQuery({ kind: 'override', target: '9.9.9.9', lang: 'es' }).lang).toBe('es');
  });

  it('checks the overrides of tagged items', () => {
    expect(() => normalizeQuery({ kind: 'override', target: '1.1.1.1', fields: 'city' })).toThrow(
      '"fields" must be an array of strings, got string'
    );
    expect(() => normalizeQuery({ kind: 'override', target: '1.1.1.1', lang: 7 })).toThrow(
      '"lang" must be a non-empty string, got number'
    );
    expect(() => normalizeQuery({ kind: 'plain', target: ' ' })).toThrow(InvalidQueryError);
  });

  it('trims the target and fields of tagged items', () => {
    expect(
      normalizeQuery({ kind: 'override', target: ' 1.1.1.1 ', fields: [' city '] })
    ).toEqual({
      target: '1.1.1.1',
      fields: ['city', 'status', 'message', 'query'],
      lang: 'en',
    });
  });

  it('throws for malformed input', () => {
    expect(() => normalizeQuery({ query: '' })).toThrow(InvalidQueryError);
  });
});

describe('resolveDefaults', () => {
  it('appends the service fields', () => {
    expect(resolveDefaults({ fields: [' lat ', 'lon'] })).toEqual({
      fields: ['lat', 'lon', 'status', 'message', 'query'],
      lang: 'en',
    });
  });

  it('rejects bad defaults', () => {
    expect(() => resolveDefaults({ fields: [''] })).toThrow(ConfigurationError);
    expect(() => resolveDefaults({ lang: ' ' })).toThrow(ConfigurationError);
  });
});

describe('withServiceFields', () => {
  it('keeps order and adds only the missing service fields', () => {
    expect(withServiceFields(['query', 'country', 'country'])).toEqual([
      'query',
      'country',
      'status',
      'message',
    ]);
  });
});

describe('assertBatchable', () => {
  it('accepts IP literals', () => {
    expect(() => assertBatchable(normalizeQuery('8.8.8.8'))).not.toThrow();
    expect(() => assertBatchable(normalizeQuery('2001:4860:4860::8888'))).not.toThrow();
  });

  it('rejects domain names', () => {
    expect(() => assertBatchable(normalizeQuery('example.com'))).toThrow(UnsupportedQueryError);
  });
});
