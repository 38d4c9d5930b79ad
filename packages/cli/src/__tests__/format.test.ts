/**
 * @summary Tests for terminal formatting of lookup results.
 */

import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import { formatJson, formatResult } from '../format.js';

const plain = new Chalk({ level: 0 });

describe('formatResult', () => {
  it('prints status, query and fields in response order', () => {
    const line = formatResult(
      { status: 'success', query: '8.8.8.8', country: 'United States', lat: 37.4, mobile: false },
      plain
    );

    expect(line).toBe('success 8.8.8.8 country=United States lat=37.4 mobile=false');
  });

  it('skips empty fields', () => {
    expect(formatResult({ status: 'success', query: '1.1.1.1', zip: '', city: 'Sydney' }, plain)).toBe(
      'success 1.1.1.1 city=Sydney'
    );
  });

  it('prints the message of fail results', () => {
    expect(
      formatResult({ status: 'fail', message: 'private range', query: '10.0.0.1' }, plain)
    ).toBe('fail 10.0.0.1 private range');
  });

  it('colours the status', () => {
    const colour = new Chalk({ level: 1 });

    expect(formatResult({ status: 'success', query: '1.1.1.1' }, colour)).toBe(
      `${colour.green('success')} 1.1.1.1`
    );
    expect(formatResult({ status: 'fail', query: '10.0.0.1' }, colour)).toBe(
      `${colour.red('fail')} 10.0.0.1`
    );
  });
});

describe('formatJson', () => {
  it('prints one compact object', () => {
    expect(formatJson({ status: 'success', query: '1.1.1.1', country: 'Australia' })).toBe(
      '{"status":"success","query":"1.1.1.1","country":"Australia"}'
    );
  });
});
