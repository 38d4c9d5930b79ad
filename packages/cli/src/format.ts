/**
 * @summary Terminal formatting of lookup results.
 *
 * Human output is one line per result: the coloured status, the query and
 * the remaining fields as `name=value` pairs in response order. JSON output
 * is one compact object per line (NDJSON).
 *
 * Used by:
 * - The lookup command
 */

import chalk, { type ChalkInstance } from "chalk";
import type { LocationResult } from "@ipgeo/client";

const SERVICE_KEYS = new Set(["status", "message", "query"]);

/**
 * Format one result for humans.
 *
 * @param result - Lookup result
 * @param painter - Chalk instance, replaceable to control colour output
 *
 * @example
 * ```typescript
 * formatResult({ status: "success", query: "8.8.8.8", country: "United States" });
 * // "success 8.8.8.8 country=United States" (status in green)
 * ```
 */
export function formatResult(result: LocationResult, painter: ChalkInstance = chalk): string {
  const parts: string[] = [
    result.status === "success" ? painter.green(result.status) : painter.red(result.status),
    result.query,
  ];

  if (result.status === "fail") {
    if (result.message !== undefined) {
      parts.push(painter.gray(result.message));
    }
    return parts.join(" ");
  }

  for (const [name, value] of Object.entries(result)) {
    if (SERVICE_KEYS.has(name) || value === undefined || value === "") {
      continue;
    }
    parts.push(`${name}=${formatValue(value)}`);
  }
  return parts.join(" ");
}

/**
 * Format one result as a JSON line.
 */
export function formatJson(result: LocationResult): string {
  return JSON.stringify(result);
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(value);
}
