/**
 * @summary Central export point for utility functions in @ipgeo/core.
 *
 * Usage:
 * ```typescript
 * import { isIpAddress, sleep, createConsoleLogger } from "@ipgeo/core/utils";
 * ```
 */

export { isIpAddress, isDomainName } from "./ip.js";

export { sleep, type SleepFn } from "./sleep.js";

export {
  createConsoleLogger,
  silentLogger,
  type Logger,
  type ConsoleLoggerOptions,
} from "./logger.js";
