/**
 * @summary Tests for fixed-delay retry of network exchanges.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ConfigurationError,
  HttpStatusError,
  NetworkExhaustedError,
  TransportError,
} from '@ipgeo/core';
import {
  DEFAULT_RETRY_POLICY,
  RetryingTransport,
  assertRetryPolicy,
  retryWithFixedDelay,
} from '../retry-logic.js';
import { StubSession, jsonResponse } from './stub-session.js';

const TEST_URL = 'http://ip-api.com/batch?lang=en';

describe('retryWithFixedDelay', () => {
  it('returns the first success without sleeping', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn(async () => 'ok');

    expect(await retryWithFixedDelay(fn, DEFAULT_RETRY_POLICY, { sleep })).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries transport failures with a fixed delay', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const onRetry = vi.fn();
    const failure = new TransportError(TEST_URL, new Error('ECONNRESET'));
    const fn = vi
      .fn(async (): Promise<string> => 'unused')
      .mockRejectedValueOnce(failure)
      .mockRejectedValueOnce(failure)
      .mockResolvedValueOnce('ok');

    const result = await retryWithFixedDelay(fn, { maxAttempts: 3, delayMs: 1000 }, { sleep, onRetry });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [1000]]);
    expect(onRetry.mock.calls).toEqual([
      [1, failure],
      [2, failure],
    ]);
  });

  it('gives up after the last attempt without a final sleep', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const last = new TransportError(TEST_URL, new Error('connect ECONNREFUSED'));
    const fn = vi.fn(async (): Promise<string> => {
      throw last;
    });

    const attempt = retryWithFixedDelay(fn, { maxAttempts: 3, delayMs: 250 }, { sleep });

    await expect(attempt).rejects.toBeInstanceOf(NetworkExhaustedError);
    await expect(attempt).rejects.toMatchObject({ attempts: 3, cause: last });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('retries errors carrying a network code', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi
      .fn(async (): Promise<string> => 'unused')
      .mockRejectedValueOnce(Object.assign(new Error('getaddrinfo EAI_AGAIN'), { code: 'EAI_AGAIN' }))
      .mockResolvedValueOnce('ok');

    expect(await retryWithFixedDelay(fn, { maxAttempts: 2, delayMs: 0 }, { sleep })).toBe('ok');
  });

  it('rethrows other errors at once', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const error = new HttpStatusError(500);
    const fn = vi.fn(async (): Promise<string> => {
      throw error;
    });

    await expect(retryWithFixedDelay(fn, DEFAULT_RETRY_POLICY, { sleep })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('makes a single attempt when maxAttempts is 1', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn(async (): Promise<string> => {
      throw new TransportError(TEST_URL);
    });

    await expect(retryWithFixedDelay(fn, { maxAttempts: 1, delayMs: 1000 }, { sleep })).rejects.toThrow(
      'Network request failed after 1 attempt: Request to http://ip-api.com/batch?lang=en failed: network error'
    );
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe('assertRetryPolicy', () => {
  it('rejects invalid policies', () => {
    expect(() => assertRetryPolicy({ maxAttempts: 0, delayMs: 0 })).toThrow(ConfigurationError);
    expect(() => assertRetryPolicy({ maxAttempts: 3, delayMs: -1 })).toThrow(ConfigurationError);
  });

  it('accepts the default policy', () => {
    expect(() => assertRetryPolicy(DEFAULT_RETRY_POLICY)).not.toThrow();
  });
});

describe('RetryingTransport', () => {
  it('retries failed sends and returns the completed exchange', async () => {
    let calls = 0;
    const session = new StubSession(() => {
      calls++;
      if (calls === 1) {
        throw new TransportError(TEST_URL, new Error('socket hang up'));
      }
      return jsonResponse([]);
    });
    const sleep = vi.fn(async (_ms: number) => {});
    const transport = new RetryingTransport(session, { maxAttempts: 3, delayMs: 1000 }, { sleep });

    const response = await transport.exchange({ method: 'POST', url: TEST_URL, body: [] });

    expect(response.status).toBe(200);
    expect(session.requests).toHaveLength(2);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it('does not retry completed exchanges, whatever their status', async () => {
    const session = new StubSession(() => jsonResponse(null, { status: 429 }));
    const transport = new RetryingTransport(session);

    const response = await transport.exchange({ method: 'POST', url: TEST_URL, body: [] });

    expect(response.status).toBe(429);
    expect(session.requests).toHaveLength(1);
  });

  it('validates its policy', () => {
    const session = new StubSession(() => jsonResponse([]));
    expect(() => new RetryingTransport(session, { maxAttempts: 0, delayMs: 0 })).toThrow(
      ConfigurationError
    );
  });
});
