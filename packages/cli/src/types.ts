/**
 * Type definitions for CLI
 */

import type { LogLevel } from "@typeforge/runtime";

/**
 * Runtime settings a project may fix in typeforge.json
 */
export type TypeforgeRuntimeConfig = {
  readonly coreLoadUnitName?: string;
  readonly standardLibraryName?: string;
  readonly lazyMethodGroups?: boolean;
  readonly suppressInterfaceWarnings?: boolean;
  readonly strictDuplicateDefinitions?: boolean;
  readonly logLevel?: LogLevel;
};

/**
 * Typeforge configuration file (typeforge.json)
 */
export type TypeforgeConfig = {
  readonly $schema?: string;
  /** Manifest paths, relative to the directory holding the file. */
  readonly manifests?: readonly string[];
  readonly options?: TypeforgeRuntimeConfig;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  type?: string;
  json?: boolean;
  /** Flags the parser did not recognise. */
  unknown?: string[];
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string;
  /** Absolute manifest paths, in load order. */
  readonly manifests: readonly string[];
  readonly runtimeOptions: TypeforgeRuntimeConfig;
  readonly logLevel: LogLevel;
  readonly typeName: string | undefined;
  readonly json: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
