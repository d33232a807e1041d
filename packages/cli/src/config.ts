/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { error, isLogLevel, LOG_LEVEL_ENV, ok, type LogLevel, type Result } from "@typeforge/runtime";
import type {
  CliOptions,
  ResolvedConfig,
  TypeforgeConfig,
  TypeforgeRuntimeConfig,
} from "./types.js";

export const CONFIG_FILE_NAME = "typeforge.json";

type Fields = Readonly<Record<string, unknown>>;

const isRecord = (value: unknown): value is Fields =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const BOOLEAN_OPTIONS = [
  "lazyMethodGroups",
  "suppressInterfaceWarnings",
  "strictDuplicateDefinitions",
] as const;

const STRING_OPTIONS = ["coreLoadUnitName", "standardLibraryName"] as const;

const validateOptions = (
  value: unknown
): Result<TypeforgeRuntimeConfig, string> => {
  if (value === undefined) return ok({});
  if (!isRecord(value)) {
    return error(`${CONFIG_FILE_NAME}: 'options' must be an object`);
  }

  for (const key of BOOLEAN_OPTIONS) {
    if (value[key] !== undefined && typeof value[key] !== "boolean") {
      return error(`${CONFIG_FILE_NAME}: 'options.${key}' must be a boolean`);
    }
  }
  for (const key of STRING_OPTIONS) {
    if (value[key] !== undefined && typeof value[key] !== "string") {
      return error(`${CONFIG_FILE_NAME}: 'options.${key}' must be a string`);
    }
  }

  const logLevel = value["logLevel"];
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    return error(
      `${CONFIG_FILE_NAME}: 'options.logLevel' must be one of silent, error, warning, info, debug`
    );
  }

  const flag = (key: (typeof BOOLEAN_OPTIONS)[number]): boolean | undefined => {
    const entry = value[key];
    return typeof entry === "boolean" ? entry : undefined;
  };
  const text = (key: (typeof STRING_OPTIONS)[number]): string | undefined => {
    const entry = value[key];
    return typeof entry === "string" ? entry : undefined;
  };

  return ok({
    coreLoadUnitName: text("coreLoadUnitName"),
    standardLibraryName: text("standardLibraryName"),
    lazyMethodGroups: flag("lazyMethodGroups"),
    suppressInterfaceWarnings: flag("suppressInterfaceWarnings"),
    strictDuplicateDefinitions: flag("strictDuplicateDefinitions"),
    logLevel: isLogLevel(logLevel) ? logLevel : undefined,
  });
};

/**
 * Validate parsed JSON as a typeforge.json document
 */
export const validateConfig = (value: unknown): Result<TypeforgeConfig, string> => {
  if (!isRecord(value)) {
    return error(`${CONFIG_FILE_NAME}: expected a JSON object`);
  }

  const manifests = value["manifests"];
  if (manifests !== undefined && !isStringArray(manifests)) {
    return error(`${CONFIG_FILE_NAME}: 'manifests' must be an array of strings`);
  }

  const schema = value["$schema"];
  const options = validateOptions(value["options"]);
  if (!options.ok) return options;

  return ok({
    ...(typeof schema === "string" ? { $schema: schema } : {}),
    manifests: manifests ?? [],
    options: options.value,
  });
};

/**
 * Load typeforge.json from a path
 */
export const loadConfig = (
  configPath: string
): Result<TypeforgeConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (failure) {
    return error(
      `Failed to parse ${CONFIG_FILE_NAME}: ${failure instanceof Error ? failure.message : String(failure)}`
    );
  }
  return validateConfig(parsed);
};

/**
 * Find typeforge.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

const resolveLogLevel = (
  config: TypeforgeConfig,
  cliOptions: CliOptions,
  env: Readonly<Record<string, string | undefined>>
): LogLevel => {
  if (cliOptions.quiet) return "error";
  if (cliOptions.verbose) return "info";
  const fromEnv = env[LOG_LEVEL_ENV];
  return config.options?.logLevel ?? (isLogLevel(fromEnv) ? fromEnv : "warning");
};

/**
 * Resolve final configuration from file + CLI args. Manifests named on the
 * command line replace the configured ones and are taken relative to `cwd`.
 * @param projectRoot - Directory containing typeforge.json
 */
export const resolveConfig = (
  config: TypeforgeConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  manifestArgs: readonly string[] = [],
  cwd: string = projectRoot,
  env: Readonly<Record<string, string | undefined>> = process.env
): ResolvedConfig => {
  const manifests =
    manifestArgs.length > 0
      ? manifestArgs.map((path) => resolve(cwd, path))
      : (config.manifests ?? []).map((path) => resolve(projectRoot, path));

  return {
    projectRoot,
    manifests,
    runtimeOptions: config.options ?? {},
    logLevel: resolveLogLevel(config, cliOptions, env),
    typeName: cliOptions.type,
    json: cliOptions.json ?? false,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
