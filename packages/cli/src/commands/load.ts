/**
 * Load command helper - reads the configured manifests into a fresh runtime
 */

import {
  addDiagnostic,
  createConsoleHost,
  createDiagnostic,
  createDiagnosticsCollector,
  createRuntime,
  initialize,
  isTypeModelError,
  loadManifestFile,
  registerManifest,
  error,
  ok,
  type Diagnostic,
  type DiagnosticsCollector,
  type Host,
  type Manifest,
  type Result,
  type TypeHandle,
  type TypeRuntime,
} from "@typeforge/runtime";
import type { ResolvedConfig } from "../types.js";

export type LoadedProject = {
  readonly runtime: TypeRuntime;
  /** Every declared type, in manifest order. */
  readonly handles: readonly TypeHandle[];
};

const readManifests = (
  paths: readonly string[]
): Result<readonly Manifest[], readonly Diagnostic[]> => {
  let collector: DiagnosticsCollector = createDiagnosticsCollector();
  const manifests: Manifest[] = [];

  for (const path of paths) {
    const result = loadManifestFile(path);
    if (result.ok) {
      manifests.push(result.value);
    } else {
      for (const diagnostic of result.error) {
        collector = addDiagnostic(collector, diagnostic);
      }
    }
  }

  return collector.hasErrors ? error(collector.diagnostics) : ok(manifests);
};

/**
 * Read every manifest, declare its types and seal the runtime. Nothing is
 * built yet; callers dereference the handles they need.
 */
export const loadProject = (
  config: ResolvedConfig,
  host: Host = createConsoleHost(config.logLevel)
): Result<LoadedProject, readonly Diagnostic[]> => {
  if (config.manifests.length === 0) {
    return error([
      createDiagnostic(
        "TFG9001",
        "error",
        "No manifests to load",
        undefined,
        "List them under 'manifests' in typeforge.json or pass them as arguments"
      ),
    ]);
  }

  const manifests = readManifests(config.manifests);
  if (!manifests.ok) return manifests;

  const runtime = createRuntime({
    ...config.runtimeOptions,
    logLevel: config.logLevel,
    host,
  });

  const handles: TypeHandle[] = [];
  try {
    for (const manifest of manifests.value) {
      handles.push(...registerManifest(runtime, manifest));
    }
  } catch (failure) {
    if (isTypeModelError(failure)) return error([failure.diagnostic]);
    throw failure;
  }

  initialize(runtime);
  return ok({ runtime, handles });
};
