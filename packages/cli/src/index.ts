#!/usr/bin/env node
/**
 * Typeforge CLI - loads type manifests and inspects the declared types
 */

import { runCli } from "./cli.js";

// Run CLI with arguments (skip node and script name)
const args = process.argv.slice(2);

runCli(args)
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });

// Export for testing
export { runCli } from "./cli.js";
export * from "./types.js";
export * from "./config.js";
export * from "./commands/load.js";
export * from "./commands/inspect.js";
export * from "./commands/check.js";
