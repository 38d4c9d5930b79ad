/**
 * @summary Maps canonical queries onto the service's wire format.
 *
 * Host selection is a pure mapping: the pro host over HTTPS whenever an API
 * key is configured, the free host otherwise (HTTP unless HTTPS is asked
 * for). Request shapes:
 *
 * - Single: `GET {host}json/{target}?fields={csv}&lang={lang}[&key={key}]`
 * - Batch:  `POST {host}batch?lang={lang}[&key={key}]` with a JSON array of
 *   `{ query, fields: [...], lang? }`; `lang` is left out of an element
 *   when it matches the URL.
 *
 * Used by:
 * - Dispatcher, to build every request
 */

import type { CanonicalQuery, HttpRequest, IpApiConfig } from "@ipgeo/core";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Settings the router needs.
 */
export type EndpointRouterConfig = Pick<
  IpApiConfig,
  "baseUrl" | "proUrl" | "jsonEndpoint" | "batchEndpoint" | "https"
> & {
  /** API key, selects the pro host */
  key?: string | undefined;
};

/**
 * Query for the single endpoint; no target means the caller's own address.
 */
export type SingleQuery = Pick<CanonicalQuery, "fields" | "lang"> & {
  readonly target?: string | undefined;
};

/**
 * One element of a batch request body.
 */
export interface BatchElement {
  query: string;
  fields: string[];
  lang?: string;
}

// ---------------------------------------------------------------------------
// Endpoint Router
// ---------------------------------------------------------------------------

/**
 * Builds single and batch requests for one client.
 *
 * @example
 * ```typescript
 * const router = new EndpointRouter({ ...DEFAULT_CONFIG });
 * router.singleRequest({ target: "8.8.8.8", fields: ["country"], lang: "en" }).url;
 * // "http://ip-api.com/json/8.8.8.8?fields=country&lang=en"
 * ```
 */
export class EndpointRouter {
  private readonly config: EndpointRouterConfig;
  private readonly host: string;

  constructor(config: EndpointRouterConfig) {
    this.config = config;
    this.host = resolveHost(config);
  }

  /**
   * Resolved host URL, always ending with a slash.
   */
  get baseUrl(): string {
    return this.host;
  }

  /**
   * Build a single-endpoint request.
   */
  singleRequest(query: SingleQuery, signal?: AbortSignal): HttpRequest {
    const path =
      query.target === undefined
        ? this.config.jsonEndpoint
        : `${this.config.jsonEndpoint}/${encodeTarget(query.target)}`;

    const params: [string, string][] = [
      ["fields", encodeList(query.fields)],
      ["lang", encodeURIComponent(query.lang)],
    ];

    const request: HttpRequest = {
      method: "GET",
      url: `${this.host}${path}?${this.queryString(params)}`,
    };
    if (signal !== undefined) {
      request.signal = signal;
    }
    return request;
  }

  /**
   * Build a batch-endpoint request.
   *
   * @param queries - Queries of one batch, in order
   * @param lang - Call-level language, sent in the URL
   */
  batchRequest(
    queries: readonly CanonicalQuery[],
    lang: string,
    signal?: AbortSignal
  ): HttpRequest {
    const body: BatchElement[] = queries.map((query) => {
      const element: BatchElement = { query: query.target, fields: [...query.fields] };
      if (query.lang !== lang) {
        element.lang = query.lang;
      }
      return element;
    });

    const request: HttpRequest = {
      method: "POST",
      url: `${this.host}${this.config.batchEndpoint}?${this.queryString([
        ["lang", encodeURIComponent(lang)],
      ])}`,
      body,
    };
    if (signal !== undefined) {
      request.signal = signal;
    }
    return request;
  }

  private queryString(params: [string, string][]): string {
    if (this.config.key !== undefined) {
      params.push(["key", encodeURIComponent(this.config.key)]);
    }
    return params.map(([name, value]) => `${name}=${value}`).join("&");
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Pick the host for a configuration.
 */
export function resolveHost(config: EndpointRouterConfig): string {
  const url =
    config.key !== undefined ? new URL(config.proUrl) : new URL(config.baseUrl);
  if (config.key !== undefined || config.https) {
    url.protocol = "https:";
  }
  const href = url.toString();
  return href.endsWith("/") ? href : `${href}/`;
}

/**
 * Percent-encode each list item and join with literal commas.
 */
function encodeList(values: readonly string[]): string {
  return values.map((value) => encodeURIComponent(value)).join(",");
}

/**
 * Percent-encode a target for the URL path, keeping IPv6 colons literal.
 */
function encodeTarget(target: string): string {
  return encodeURIComponent(target).replace(/%3A/gi, ":");
}
