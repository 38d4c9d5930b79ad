/**
 * @summary CLI command to look up the geolocation of IP addresses.
 *
 * Targets come from the command line, from a file (one per line, streamed)
 * or both. With no target at all the caller's own address is looked up. A
 * single command-line target uses the single endpoint, so it may be a domain
 * name; anything more goes through the batch endpoint.
 *
 * Settings are read from IPGEO_* environment variables first and then
 * overridden by command-line options.
 *
 * Used by:
 * - The CLI program factory to register the 'lookup' command
 */

import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";

import chalk from "chalk";
import { InvalidArgumentError, type Command } from "commander";
import {
  IpApiClient,
  type HttpSession,
  type IpApiClientConfig,
  type LocationResult,
} from "@ipgeo/client";
import {
  configFromEnv,
  createConsoleLogger,
  parseCommaSeparated,
  type Logger,
} from "@ipgeo/core";

import { formatJson, formatResult } from "../format.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Options for the lookup command, as parsed by commander.
 */
export interface LookupOptions {
  fields?: string;
  lang?: string;
  key?: string;
  https?: boolean;
  batchSize?: number;
  retryAttempts?: number;
  retryDelay?: number;
  timeout?: number;
  file?: string;
  json?: boolean;
  debug?: boolean;
}

/**
 * Where the command reads its environment and writes its output.
 */
export interface LookupIo {
  /** Output line sink */
  write(line: string): void;

  /** Environment variables */
  env?: Record<string, string | undefined>;

  /** HTTP session for the client, owned by the caller */
  session?: HttpSession;

  /** Logger for client diagnostics */
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

/**
 * Register the 'lookup' command with the CLI program.
 *
 * @param program - Commander program instance to register the command on
 *
 * @example
 * ```bash
 * ipgeo lookup
 * ipgeo lookup 8.8.8.8 --fields country,city --lang de
 * ipgeo lookup --file addresses.txt --json
 * ```
 */
export function registerLookupCommand(program: Command): void {
  program
    .command("lookup")
    .description("Look up the geolocation of IP addresses (own address when none given)")
    .argument("[targets...]", "IP addresses; a lone target may also be a domain name")
    .option("-f, --fields <list>", "Comma separated response fields")
    .option("-l, --lang <code>", "Response language")
    .option("-k, --key <key>", "API key for the pro host")
    .option("--https", "Use HTTPS on the free host")
    .option("--batch-size <n>", "Maximum queries per batch request", parsePositiveInteger)
    .option("--retry-attempts <n>", "Attempts per network request", parsePositiveInteger)
    .option("--retry-delay <ms>", "Delay between attempts in milliseconds", parseNonNegativeNumber)
    .option("--timeout <ms>", "Request timeout in milliseconds", parsePositiveInteger)
    .option("--file <path>", "Read targets from a file, one per line")
    .option("--json", "Print one JSON object per line")
    .option("--debug", "Print debug diagnostics")
    .action(async (targets: string[], options: LookupOptions) => {
      try {
        await runLookup(targets, options, { write: (line) => console.log(line) });
      } catch (error) {
        console.error(chalk.red("Error:"), error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });
}

/**
 * Run one lookup and write its results.
 *
 * @returns Number of results written
 */
export async function runLookup(
  targets: readonly string[],
  options: LookupOptions,
  io: LookupIo
): Promise<number> {
  const config = buildClientConfig(options, io.env ?? process.env);
  config.logger = io.logger ?? createConsoleLogger("ipgeo", { debug: config.debug ?? false });
  if (io.session !== undefined) {
    config.session = io.session;
  }

  const print = (result: LocationResult): void => {
    io.write(options.json ? formatJson(result) : formatResult(result));
  };

  const client = new IpApiClient(config);
  try {
    const [first] = targets;
    if (options.file === undefined && targets.length <= 1) {
      print(first === undefined ? await client.location() : await client.location(first));
      return 1;
    }

    let count = 0;
    for await (const result of client.locationStream(collectTargets(targets, options.file))) {
      print(result);
      count++;
    }
    return count;
  } finally {
    await client.close();
  }
}

/**
 * Layer command-line options over the environment settings.
 *
 * @throws ConfigurationError when an environment variable is malformed
 */
export function buildClientConfig(
  options: LookupOptions,
  env: Record<string, string | undefined>
): IpApiClientConfig {
  const config: IpApiClientConfig = { ...configFromEnv(env) };

  if (options.fields !== undefined) {
    config.fields = parseCommaSeparated(options.fields);
  }
  if (options.lang !== undefined) {
    config.lang = options.lang;
  }
  if (options.key !== undefined) {
    config.key = options.key;
  }
  if (options.https) {
    config.https = true;
  }
  if (options.batchSize !== undefined) {
    config.batchSize = options.batchSize;
  }
  if (options.retryAttempts !== undefined) {
    config.retryAttempts = options.retryAttempts;
  }
  if (options.retryDelay !== undefined) {
    config.retryDelayMs = options.retryDelay;
  }
  if (options.timeout !== undefined) {
    config.timeoutMs = options.timeout;
  }
  if (options.debug) {
    config.debug = true;
  }

  return config;
}

/**
 * Read non-blank, non-comment lines of a file, trimmed.
 */
export async function* readTargetFile(path: string): AsyncGenerator<string, void, undefined> {
  const lines = createInterface({
    input: createReadStream(path, { encoding: "utf8" }),
    crlfDelay: Infinity,
  });
  try {
    for await (const line of lines) {
      const target = line.trim();
      if (target !== "" && !target.startsWith("#")) {
        yield target;
      }
    }
  } finally {
    lines.close();
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function* collectTargets(
  targets: readonly string[],
  file: string | undefined
): AsyncGenerator<string, void, undefined> {
  yield* targets;
  if (file !== undefined) {
    yield* readTargetFile(file);
  }
}

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be an integer >= 1.");
  }
  return parsed;
}

function parseNonNegativeNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Must be a number >= 0.");
  }
  return parsed;
}
