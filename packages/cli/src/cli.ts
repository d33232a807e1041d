/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export {
  VERSION,
  HELP_TEXT,
  parseArgs,
  runCli,
  EXIT_CODES,
  type CliContext,
  type ParsedArgs,
} from "./cli/index.js";
