/**
 * @summary Central export point for all CLI commands.
 *
 * Used by:
 * - The CLI program factory to register every command
 */

export { registerLookupCommand } from "./lookup.js";
