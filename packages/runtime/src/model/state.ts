/**
 * Runtime state container
 */

import { resolveRuntimeOptions, type RuntimeOptions } from "../config/options.js";
import { getLoadUnit } from "../identity/load-units.js";
import { createNamespaceNode } from "../registry/namespaces.js";
import type { TypeRuntime } from "./types.js";

/**
 * Create an empty runtime with only the core load unit declared. Use
 * `createRuntime` for one with the built-in types registered.
 */
export const createRuntimeState = (options: RuntimeOptions = {}): TypeRuntime => {
  const runtime: TypeRuntime = {
    options: resolveRuntimeOptions(options),
    diagnostics: [],
    globalNamespace: createNamespaceNode("", null),
    loadUnits: new Map(),
    loadUnitShortNames: new Map(),
    nextLoadUnitId: 0,
    coreLoadUnit: null,
    publicTypes: new Map(),
    publicTypeLoadUnits: new Map(),
    assignedTypeIds: new Map(),
    genericParameterIds: new Map(),
    nextTypeId: 0,
    bindings: [],
    sealed: false,
    externalQueues: new Map(),
    externalTables: new Map(),
    warnedPlaceholders: new Set(),
    signatureCache: new Map(),
    arrayTypes: new Map(),
    rootInitialized: false,
    stubRuntimeType: null,
    anyType: null,
  };
  runtime.coreLoadUnit = getLoadUnit(runtime, runtime.options.coreLoadUnitName);
  return runtime;
};
