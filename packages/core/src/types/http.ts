/**
 * @summary HTTP session interface consumed by the dispatch engine.
 *
 * The engine never talks to the network directly: it sends requests through
 * an `HttpSession`, which callers may supply to share connections between
 * clients. The client package ships a fetch-backed implementation.
 */

/**
 * HTTP methods used by the service.
 */
export type HttpMethod = "GET" | "POST";

/**
 * One outgoing request.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;

  /** JSON-serializable body */
  body?: unknown;

  /** Caller cancellation */
  signal?: AbortSignal;
}

/**
 * A completed exchange, whatever its status.
 */
export interface HttpResponse {
  status: number;

  /** Response headers, looked up case-insensitively */
  headers: Headers;

  /** Parsed JSON body, or the raw text when it is not JSON */
  body: unknown;
}

/**
 * Network capability: sends requests and owns connection resources.
 *
 * `send` resolves for every completed exchange and rejects with a
 * `TransportError` when the exchange could not complete.
 */
export interface HttpSession {
  send(request: HttpRequest): Promise<HttpResponse>;
  close(): Promise<void>;
}
