/**
 * Manifest file loading
 */

import { existsSync, readFileSync } from "node:fs";
import { createDiagnostic, type Diagnostic } from "../types/diagnostic.js";
import { error, flatMap, ok, type Result } from "../types/result.js";
import type { Manifest } from "./types.js";
import { parseManifest } from "./validate.js";

const readJson = (path: string): Result<unknown, readonly Diagnostic[]> => {
  if (!existsSync(path)) {
    return error([
      createDiagnostic("TFG9001", "error", `Manifest file not found: ${path}`, path),
    ]);
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (failure) {
    return error([
      createDiagnostic(
        "TFG9002",
        "error",
        `Failed to read manifest file: ${failure instanceof Error ? failure.message : String(failure)}`,
        path
      ),
    ]);
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return ok(parsed);
  } catch (failure) {
    return error([
      createDiagnostic(
        "TFG9003",
        "error",
        `Invalid JSON in manifest file: ${failure instanceof Error ? failure.message : String(failure)}`,
        path
      ),
    ]);
  }
};

/**
 * Read and validate a manifest file
 */
export const loadManifestFile = (path: string): Result<Manifest, readonly Diagnostic[]> =>
  flatMap(readJson(path), (value) => parseManifest(value, path));
