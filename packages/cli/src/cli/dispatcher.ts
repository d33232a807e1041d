/**
 * CLI command dispatcher
 */

import { dirname, join } from "node:path";
import { formatDiagnostic, type Host } from "@typeforge/runtime";
import { findConfig, loadConfig, resolveConfig } from "../config.js";
import { checkCommand, formatCheckSummary } from "../commands/check.js";
import { inspectCommand } from "../commands/inspect.js";
import { loadProject } from "../commands/load.js";
import type { TypeforgeConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { HELP_TEXT } from "./help.js";
import { parseArgs } from "./parser.js";

export const EXIT_CODES = {
  ok: 0,
  error: 1,
  usage: 2,
  config: 3,
  manifest: 4,
  check: 5,
} as const;

const COMMANDS: ReadonlySet<string> = new Set(["inspect", "check"]);

export type CliContext = {
  readonly cwd: string;
  readonly env: Readonly<Record<string, string | undefined>>;
  /** Runtime host; defaults to a console host at the resolved log level. */
  readonly host?: Host;
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
};

const defaultContext = (): CliContext => ({
  cwd: process.cwd(),
  env: process.env,
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
});

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  context: CliContext = defaultContext()
): Promise<number> => {
  const parsed = parseArgs(args);
  const { stdout, stderr } = context;

  if (parsed.command === "version") {
    stdout(`typeforge v${VERSION}`);
    return EXIT_CODES.ok;
  }

  if (parsed.command === "help" || !parsed.command) {
    stdout(HELP_TEXT);
    return EXIT_CODES.ok;
  }

  if (!COMMANDS.has(parsed.command)) {
    stderr(`Error: Unknown command '${parsed.command}'`);
    stderr("Run 'typeforge --help' for usage information");
    return EXIT_CODES.usage;
  }

  const unknown = parsed.options.unknown ?? [];
  if (unknown.length > 0) {
    stderr(`Error: Unknown option '${unknown.join("', '")}'`);
    return EXIT_CODES.usage;
  }

  // Load config
  const configPath = parsed.options.config
    ? join(context.cwd, parsed.options.config)
    : findConfig(context.cwd);

  let fileConfig: TypeforgeConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      stderr(`Error: ${configResult.error}`);
      return EXIT_CODES.config;
    }
    fileConfig = configResult.value;
  }

  // Project root is the directory containing typeforge.json
  const projectRoot = configPath ? dirname(configPath) : context.cwd;
  const config = resolveConfig(
    fileConfig,
    parsed.options,
    projectRoot,
    parsed.positionals,
    context.cwd,
    context.env
  );

  const project = loadProject(config, context.host);
  if (!project.ok) {
    for (const diagnostic of project.error) {
      stderr(formatDiagnostic(diagnostic));
    }
    return EXIT_CODES.manifest;
  }

  switch (parsed.command) {
    case "inspect": {
      const result = inspectCommand(project.value, {
        typeName: config.typeName,
        json: config.json,
      });
      if (!result.ok) {
        stderr(`Error: ${result.error}`);
        return EXIT_CODES.error;
      }
      stdout(result.value);
      return EXIT_CODES.ok;
    }

    default: {
      const summary = checkCommand(project.value);
      const failed = summary.failed.length > 0 || summary.errors.length > 0;
      if (!config.quiet || failed) {
        (failed ? stderr : stdout)(formatCheckSummary(summary));
      }
      return failed ? EXIT_CODES.check : EXIT_CODES.ok;
    }
  }
};
