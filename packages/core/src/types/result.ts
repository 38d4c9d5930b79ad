/**
 * @summary Location result returned by the service, one per query.
 */

/**
 * Application-level outcome of one query.
 */
export type LocationStatus = "success" | "fail";

/**
 * Geolocation record for one query.
 *
 * Always carries `status` and the echoed `query`; `message` is set on
 * failure. The remaining fields depend on what was requested.
 */
export interface LocationResult {
  status: LocationStatus;
  message?: string;
  query: string;

  continent?: string;
  continentCode?: string;
  country?: string;
  countryCode?: string;
  region?: string;
  regionName?: string;
  city?: string;
  district?: string;
  zip?: string;
  lat?: number;
  lon?: number;
  timezone?: string;
  offset?: number;
  currency?: string;
  isp?: string;
  org?: string;
  as?: string;
  asname?: string;
  reverse?: string;
  mobile?: boolean;
  proxy?: boolean;
  hosting?: boolean;

  [field: string]: unknown;
}

/**
 * Type guard for a decoded location record.
 */
export function isLocationResult(value: unknown): value is LocationResult {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const status = "status" in value ? value.status : undefined;
  return status === "success" || status === "fail";
}

/**
 * Build a `fail` result for a query that never reached the service or was
 * rejected before decoding.
 */
export function failedResult(query: string, message: string): LocationResult {
  return { status: "fail", message, query };
}
