/**
 * @summary Field and language sets documented by the geolocation service.
 */

/**
 * Response fields that may be requested.
 */
export const FIELDS: ReadonlySet<string> = new Set([
  "continent",
  "continentCode",
  "country",
  "countryCode",
  "region",
  "regionName",
  "city",
  "district",
  "zip",
  "lat",
  "lon",
  "timezone",
  "offset",
  "currency",
  "isp",
  "org",
  "as",
  "asname",
  "reverse",
  "mobile",
  "proxy",
  "hosting",
]);

/**
 * Fields added to every request so each result can be matched and checked.
 */
export const SERVICE_FIELDS: readonly string[] = ["status", "message", "query"];

/**
 * Fields the service returns when none are requested.
 */
export const DEFAULT_FIELDS: readonly string[] = [
  "status",
  "message",
  "country",
  "countryCode",
  "region",
  "regionName",
  "city",
  "zip",
  "lat",
  "lon",
  "timezone",
  "isp",
  "org",
  "as",
  "query",
];

/**
 * Response languages.
 */
export const LANGS: ReadonlySet<string> = new Set([
  "en",
  "de",
  "es",
  "pt-BR",
  "fr",
  "ja",
  "zh-CN",
  "ru",
]);

/**
 * Language the service answers in when none is requested.
 */
export const DEFAULT_LANG = "en";
