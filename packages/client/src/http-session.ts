/**
 * @summary Fetch-backed HTTP session.
 *
 * This module provides the default `HttpSession`: it wraps the global
 * `fetch` with a per-request timeout, default headers and JSON bodies, and
 * turns failed exchanges into `TransportError` so the retry layer can tell
 * them from completed ones.
 *
 * Features:
 * - Per-request timeout (pass-through setting, no retry of its own)
 * - Injectable fetch implementation
 * - `close()` aborts requests in flight and rejects later ones
 *
 * Used by:
 * - IpApiClient when no session is supplied
 * - Callers who want one session shared by several clients
 */

import type { HttpRequest, HttpResponse, HttpSession } from "@ipgeo/core";
import { SessionClosedError, TransportError } from "@ipgeo/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Configuration for the fetch session.
 */
export interface FetchSessionConfig {
  /**
   * Request timeout in milliseconds.
   * @default 30000 (30 seconds)
   */
  timeout?: number;

  /**
   * Default headers to include in all requests.
   */
  defaultHeaders?: Record<string, string>;

  /**
   * Fetch implementation.
   * @default globalThis.fetch
   */
  fetchFn?: typeof fetch;
}

// ---------------------------------------------------------------------------
// Fetch Session
// ---------------------------------------------------------------------------

/**
 * HTTP session on top of `fetch`.
 *
 * @example
 * ```typescript
 * const session = new FetchSession({ timeout: 10_000 });
 * const response = await session.send({
 *   method: "POST",
 *   url: "http://ip-api.com/batch",
 *   body: [{ query: "8.8.8.8" }],
 * });
 * await session.close();
 * ```
 */
export class FetchSession implements HttpSession {
  private readonly timeout: number;
  private readonly defaultHeaders: Record<string, string>;
  private readonly fetchFn: typeof fetch;
  private readonly lifetime = new AbortController();

  constructor(config: FetchSessionConfig = {}) {
    this.timeout = config.timeout ?? 30000;
    this.defaultHeaders = config.defaultHeaders ?? {};
    this.fetchFn = config.fetchFn ?? ((input, init) => fetch(input, init));
  }

  /**
   * Whether `close()` was called.
   */
  get closed(): boolean {
    return this.lifetime.signal.aborted;
  }

  /**
   * Send one request.
   *
   * @param request - Request to send
   * @returns The completed exchange, whatever its status
   * @throws TransportError when the exchange fails or times out
   * @throws SessionClosedError when the session is or gets closed
   * @throws The caller's abort reason when `request.signal` aborts
   */
  async send(request: HttpRequest): Promise<HttpResponse> {
    if (this.closed) {
      throw new SessionClosedError();
    }
    request.signal?.throwIfAborted();

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);
    const abort = (): void => controller.abort();
    this.lifetime.signal.addEventListener("abort", abort);
    request.signal?.addEventListener("abort", abort);

    const headers = new Headers(this.defaultHeaders);
    headers.set("Accept", "application/json");
    const init: RequestInit = {
      method: request.method,
      headers,
      signal: controller.signal,
    };
    if (request.body !== undefined) {
      headers.set("Content-Type", "application/json");
      init.body = JSON.stringify(request.body);
    }

    try {
      const response = await this.fetchFn(request.url, init);
      const text = await response.text();
      return {
        status: response.status,
        headers: response.headers,
        body: parseBody(text),
      };
    } catch (error) {
      if (request.signal?.aborted) {
        throw request.signal.reason;
      }
      if (this.closed) {
        throw new SessionClosedError("HTTP session was closed during the request");
      }
      throw new TransportError(
        request.url,
        error instanceof Error ? error : new Error(String(error)),
        timedOut
      );
    } finally {
      clearTimeout(timeoutId);
      this.lifetime.signal.removeEventListener("abort", abort);
      request.signal?.removeEventListener("abort", abort);
    }
  }

  /**
   * Abort requests in flight and reject later ones. Idempotent.
   */
  async close(): Promise<void> {
    this.lifetime.abort();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Parse a response body as JSON, falling back to the raw text.
 */
function parseBody(text: string): unknown {
  if (text.trim() === "") {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Create a FetchSession instance.
 *
 * @param config - Session configuration
 * @returns FetchSession instance
 */
export function createFetchSession(config: FetchSessionConfig = {}): FetchSession {
  return new FetchSession(config);
}
