/**
 * External types: names whose whole type is supplied natively, later.
 */

import { fail } from "../host/reporting.js";
import type {
  ExternalTypeSlot,
  LoadUnit,
  PublicInterface,
  TypeGetter,
  TypeRuntime,
} from "../model/types.js";
import {
  declareParentNamespaces,
  defineEntry,
  resolveName,
  resolvedEntry,
} from "../registry/namespaces.js";

const slotGetter =
  (runtime: TypeRuntime, slot: ExternalTypeSlot): TypeGetter =>
  () => {
    if (slot.value) return slot.value;
    throw fail(
      runtime,
      "TFG3004",
      `The external type '${slot.name}' has not been implemented.`,
      { subject: slot.name }
    );
  };

/**
 * Reserve a name for a type implemented natively. Lookups fail with
 * ExternalNotImplementedError until `implementExternalType` fills it.
 */
export const makeExternalType = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  name: string,
  isPublic: boolean
): ExternalTypeSlot => {
  declareParentNamespaces(runtime, loadUnit, name, isPublic);
  const slot: ExternalTypeSlot = { name, value: null };
  const getter = slotGetter(runtime, slot);

  defineEntry(resolveName(runtime, loadUnit.namespace, name, false), {
    kind: "external",
    external: slot,
  });
  loadUnit.typesByName.set(name, getter);

  if (isPublic) {
    defineEntry(resolveName(runtime, runtime.globalNamespace, name, false), {
      kind: "external",
      external: slot,
    });
    runtime.publicTypes.set(name, getter);
    runtime.publicTypeLoadUnits.set(name, loadUnit);
  }
  return slot;
};

export const implementExternalType = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  name: string,
  value: PublicInterface
): void => {
  const entry = resolvedEntry(resolveName(runtime, loadUnit.namespace, name, false));
  if (entry?.kind !== "external") {
    throw fail(
      runtime,
      "TFG2001",
      `'${name}' was not declared as an external type in load unit '${loadUnit.name}'.`,
      { subject: name }
    );
  }
  entry.external.value = value;
};
