/**
 * @summary Console-backed logging with a per-component prefix.
 *
 * Lines are written as `[Prefix] message`. Debug lines are dropped unless
 * debug output is enabled, the way the SDK's other components gate their
 * diagnostics behind a `debug` flag.
 *
 * Used by:
 * - The rate budget tracker (warning on every rate-limit wait)
 * - The retrying transport (debug line per retry)
 * - The dispatcher (warning on degraded 429 batches)
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Minimal logging surface used across the SDK.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Options for the console logger.
 */
export interface ConsoleLoggerOptions {
  /**
   * Emit debug lines.
   * @default false
   */
  debug?: boolean;

  /**
   * Console-like sink, mostly for tests.
   * @default globalThis.console
   */
  sink?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

// ---------------------------------------------------------------------------
// Implementations
// ---------------------------------------------------------------------------

/**
 * Create a logger that writes prefixed lines to the console.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger("IpApiClient", { debug: true });
 * logger.warn("API limit is reached");
 * // [IpApiClient] API limit is reached
 * ```
 */
export function createConsoleLogger(
  prefix: string,
  options: ConsoleLoggerOptions = {}
): Logger {
  const sink = options.sink ?? console;
  const debugEnabled = options.debug ?? false;
  const format = (message: string): string => `[${prefix}] ${message}`;

  return {
    debug(message) {
      if (debugEnabled) {
        sink.debug(format(message));
      }
    },
    info(message) {
      sink.info(format(message));
    },
    warn(message) {
      sink.warn(format(message));
    },
    error(message) {
      sink.error(format(message));
    },
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
