/**
 * Runtime configuration
 */

import { createConsoleHost, isLogLevel, type Host, type LogLevel } from "../host/host.js";

export type RuntimeOptions = {
  /** Name of the load unit that owns the built-in types. */
  readonly coreLoadUnitName?: string;
  /**
   * Short name of the second edition of the standard library. Its type
   * identities unify with the core load unit.
   */
  readonly standardLibraryName?: string;
  /** Register System.Object and the other built-in types on creation. */
  readonly bootstrapCorlib?: boolean;
  /** Build each method group on first access instead of at initialization. */
  readonly lazyMethodGroups?: boolean;
  readonly suppressInterfaceWarnings?: boolean;
  /** Throw on duplicate definitions instead of keeping the first one. */
  readonly strictDuplicateDefinitions?: boolean;
  readonly logLevel?: LogLevel;
  readonly host?: Host;
};

export type ResolvedRuntimeOptions = {
  readonly coreLoadUnitName: string;
  readonly standardLibraryName: string;
  readonly bootstrapCorlib: boolean;
  readonly lazyMethodGroups: boolean;
  readonly suppressInterfaceWarnings: boolean;
  readonly strictDuplicateDefinitions: boolean;
  readonly logLevel: LogLevel;
  readonly host: Host;
};

export const DEFAULT_CORE_LOAD_UNIT = "Typeforge.Core";
export const DEFAULT_STANDARD_LIBRARY = "mscorlib";
export const LOG_LEVEL_ENV = "TYPEFORGE_LOG_LEVEL";

export const resolveRuntimeOptions = (
  options: RuntimeOptions = {},
  env: Readonly<Record<string, string | undefined>> = process.env
): ResolvedRuntimeOptions => {
  const envLevel = env[LOG_LEVEL_ENV];
  const logLevel =
    options.logLevel ?? (isLogLevel(envLevel) ? envLevel : "warning");

  return {
    coreLoadUnitName: options.coreLoadUnitName ?? DEFAULT_CORE_LOAD_UNIT,
    standardLibraryName: options.standardLibraryName ?? DEFAULT_STANDARD_LIBRARY,
    bootstrapCorlib: options.bootstrapCorlib ?? true,
    lazyMethodGroups: options.lazyMethodGroups ?? false,
    suppressInterfaceWarnings: options.suppressInterfaceWarnings ?? false,
    strictDuplicateDefinitions: options.strictDuplicateDefinitions ?? false,
    logLevel,
    host: options.host ?? createConsoleHost(logLevel),
  };
};
