/**
 * CLI - Public API
 */

export { VERSION } from "./constants.js";
export { HELP_TEXT } from "./help.js";
export { parseArgs, type ParsedArgs } from "./parser.js";
export { EXIT_CODES, runCli, type CliContext } from "./dispatcher.js";
