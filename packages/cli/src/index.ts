/**
 * @summary Main entry point for the @ipgeo/cli package.
 *
 * Command-line tool for looking up IP geolocation data on ip-api.com with
 * the SDK client. Settings come from IPGEO_* environment variables and
 * command-line options.
 *
 * Used by:
 * - Developers checking where an address is located
 * - Shell pipelines geolocating address lists (`--file`, `--json`)
 */

import chalk from "chalk";

import { createProgram } from "./program.js";

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  const program = createProgram();

  await program.parseAsync(process.argv);

  // Show help if no command provided
  if (!process.argv.slice(2).length) {
    console.log(chalk.cyan("\nipgeo CLI"));
    console.log(chalk.gray("IP geolocation lookups on ip-api.com\n"));
    program.outputHelp();
  }
}

main().catch((error) => {
  console.error(chalk.red("Fatal error:"), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
