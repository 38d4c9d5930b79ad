/**
 * @summary Tests for the SDK error classes and guards.
 */

import { describe, it, expect } from 'vitest';
import {
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
} from '../types/errors.js';

describe('InvalidQueryError', () => {
  it('keeps the offending item', () => {
    const item = { query: 42 };
    const error = new InvalidQueryError('Query object is missing a string "query" field', item);

    expect(error.item).toBe(item);
    expect(error.code).toBe('INVALID_QUERY');
    expect(error.name).toBe('InvalidQueryError');
  });

  it('extends Error', () => {
    const error = new InvalidQueryError('bad', '');
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(IpApiError);
  });
});

describe('UnsupportedQueryError', () => {
  it('names the domain in its message', () => {
    const error = new UnsupportedQueryError('example.com');

    expect(error.target).toBe('example.com');
    expect(error.code).toBe('UNSUPPORTED_QUERY');
    expect(error.message).toContain('"example.com"');
  });

  it('serializes the target', () => {
    const json = new UnsupportedQueryError('example.com').toJSON();

    expect(json.name).toBe('UnsupportedQueryError');
    expect(json.target).toBe('example.com');
  });
});

describe('ConfigurationError', () => {
  it('formats option, value and requirement', () => {
    const error = new ConfigurationError('batchSize', 0, 'must be an integer >= 1');

    expect(error.message).toBe('Invalid batchSize: 0 (must be an integer >= 1)');
    expect(error.option).toBe('batchSize');
    expect(error.value).toBe(0);
    expect(error.code).toBe('CONFIGURATION');
  });
});

describe('TransportError', () => {
  it('describes the underlying failure', () => {
    const cause = new Error('socket hang up');
    const error = new TransportError('http://ip-api.com/batch', cause);

    expect(error.message).toBe('Request to http://ip-api.com/batch failed: socket hang up');
    expect(error.cause).toBe(cause);
    expect(error.timedOut).toBe(false);
  });

  it('describes a timeout', () => {
    const error = new TransportError('http://ip-api.com/json', undefined, true);

    expect(error.message).toBe('Request to http://ip-api.com/json timed out');
    expect(error.toJSON()).toEqual({
      name: 'TransportError',
      code: 'TRANSPORT',
      message: 'Request to http://ip-api.com/json timed out',
      cause: undefined,
      url: 'http://ip-api.com/json',
      timedOut: true,
    });
  });
});

describe('NetworkExhaustedError', () => {
  it('counts attempts and keeps the last failure', () => {
    const cause = new Error('ECONNRESET');
    const error = new NetworkExhaustedError(3, cause);

    expect(error.message).toBe('Network request failed after 3 attempts: ECONNRESET');
    expect(error.attempts).toBe(3);
    expect(error.cause).toBe(cause);
    expect(error.code).toBe('NETWORK_EXHAUSTED');
  });

  it('uses the singular for one attempt', () => {
    expect(new NetworkExhaustedError(1).message).toBe('Network request failed after 1 attempt');
  });
});

describe('HTTP status errors', () => {
  it('keeps the status on the generic error', () => {
    const error = new HttpStatusError(500);

    expect(error.status).toBe(500);
    expect(error.message).toBe('HTTP 500 error occurred');
  });

  it('maps the dedicated statuses', () => {
    expect(new TooManyRequestsError().status).toBe(429);
    expect(new AuthError().status).toBe(403);
    expect(new BatchTooLargeError(150).status).toBe(422);
    expect(new BatchTooLargeError(150).batchSize).toBe(150);
  });

  it('carry distinct codes', () => {
    expect(new HttpStatusError(500).code).toBe('HTTP_STATUS');
    expect(new TooManyRequestsError().code).toBe('TOO_MANY_REQUESTS');
    expect(new AuthError().code).toBe('AUTH');
    expect(new BatchTooLargeError(101).code).toBe('BATCH_TOO_LARGE');
  });
});

describe('Type Guards', () => {
  it('isIpApiError', () => {
    expect(isIpApiError(new SessionClosedError())).toBe(true);
    expect(isIpApiError(new InvalidResponseError('not an array'))).toBe(true);
    expect(isIpApiError(new Error('plain'))).toBe(false);
    expect(isIpApiError('error')).toBe(false);
  });

  it('isRetryableError accepts transport failures only', () => {
    expect(isRetryableError(new TransportError('http://ip-api.com/json'))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('reset'), { code: 'ECONNRESET' }))).toBe(true);
    expect(isRetryableError({ code: 'EAI_AGAIN' })).toBe(true);

    expect(isRetryableError(new TooManyRequestsError())).toBe(false);
    expect(isRetryableError(new HttpStatusError(503))).toBe(false);
    expect(isRetryableError(new InvalidQueryError('bad', ''))).toBe(false);
    expect(isRetryableError({ code: 'EACCES' })).toBe(false);
    expect(isRetryableError(new Error('boom'))).toBe(false);
    expect(isRetryableError(null)).toBe(false);
  });
});
