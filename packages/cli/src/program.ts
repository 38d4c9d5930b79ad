/**
 * @summary Factory for the ipgeo CLI program.
 *
 * Available commands:
 * - ipgeo lookup [targets...] - Look up IP geolocation data
 */

import { Command } from "commander";

import { registerLookupCommand } from "./commands/index.js";

/**
 * Package version - should match package.json.
 */
export const VERSION = "0.1.0";

/**
 * Create and configure the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("ipgeo")
    .description("ipgeo CLI - IP geolocation lookups on ip-api.com")
    .version(VERSION);

  registerLookupCommand(program);

  return program;
}
