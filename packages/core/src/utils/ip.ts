/**
 * @summary Target classification helpers.
 */

import { isIP } from "node:net";

/**
 * Whether a target is an IPv4 or IPv6 literal.
 */
export function isIpAddress(target: string): boolean {
  return isIP(target) !== 0;
}

/**
 * Whether a target is a domain name, i.e. anything that is not an IP
 * literal. Only the single-query endpoint resolves these.
 */
export function isDomainName(target: string): boolean {
  return !isIpAddress(target);
}
