/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  readonly command: string;
  /** Manifest paths named after the command. */
  readonly positionals: readonly string[];
  readonly options: CliOptions;
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  const positionals: string[] = [];
  let command = "";

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    if (!arg.startsWith("-")) {
      if (!command) {
        command = arg;
      } else {
        positionals.push(arg);
      }
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", positionals: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", positionals: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-t":
      case "--type":
        options.type = args[++i] ?? "";
        break;
      case "--json":
        options.json = true;
        break;
      default:
        options.unknown = [...(options.unknown ?? []), arg];
    }
  }

  return { command, positionals, options };
};
