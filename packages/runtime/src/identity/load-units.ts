/**
 * Load units: the library-level scopes types are declared in.
 *
 * A full name such as `Zoo, Version=1.0.0.0` also answers to its short name
 * (`Zoo`) until a second full name claims the same short name. The load unit
 * whose short name is the configured standard library shares the identity of
 * the core load unit, so two editions of the base library produce the same
 * type identities.
 */

import { fail } from "../host/reporting.js";
import { createNamespaceNode } from "../registry/namespaces.js";
import type { LoadUnit, TypeRuntime } from "../model/types.js";

export const getShortName = (name: string): string =>
  (name.split(",")[0] ?? name).trim();

const lookupLoadUnit = (
  runtime: TypeRuntime,
  name: string
): LoadUnit | undefined => {
  const exact = runtime.loadUnits.get(name);
  if (exact) return exact;

  const mapped = runtime.loadUnitShortNames.get(name);
  return mapped ? runtime.loadUnits.get(mapped) : undefined;
};

const rememberShortName = (
  runtime: TypeRuntime,
  fullName: string,
  shortName: string
): void => {
  if (shortName === fullName) return;
  const known = runtime.loadUnitShortNames.get(shortName);
  if (known === undefined) {
    runtime.loadUnitShortNames.set(shortName, fullName);
  } else if (known !== fullName) {
    runtime.loadUnitShortNames.set(shortName, null);
  }
};

export const getLoadUnit = (
  runtime: TypeRuntime,
  name: string,
  requireExisting = false
): LoadUnit => {
  const existing = lookupLoadUnit(runtime, name);
  if (existing) return existing;

  if (requireExisting) {
    throw fail(runtime, "TFG2001", `Load unit '${name}' has not been declared.`);
  }

  const shortName = getShortName(name);
  rememberShortName(runtime, name, shortName);

  const core = runtime.coreLoadUnit;
  const id =
    core !== null && shortName === runtime.options.standardLibraryName
      ? core.id
      : ++runtime.nextLoadUnitId;

  const loadUnit: LoadUnit = {
    kind: "loadUnit",
    name,
    shortName,
    id,
    namespace: createNamespaceNode("", runtime.globalNamespace),
    typesByName: new Map(),
  };
  runtime.loadUnits.set(name, loadUnit);
  return loadUnit;
};

export const declareLoadUnit = (runtime: TypeRuntime, name: string): LoadUnit =>
  getLoadUnit(runtime, name, false);

export const requireCoreLoadUnit = (runtime: TypeRuntime): LoadUnit =>
  runtime.coreLoadUnit ?? getLoadUnit(runtime, runtime.options.coreLoadUnitName);
