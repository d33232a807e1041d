/**
 * Type initialization
 *
 * Runs once per descriptor, on first unsealing access. A closed type gets
 * its method groups, property accessors, interface aliases, field defaults
 * and assignable set; then the queued initializers and static constructors
 * run. Closed instantiations created earlier and the base type are
 * initialized afterwards, so the root type's bootstrap cycle terminates.
 */

import { buildAssignableSet } from "../assignability/assignable-set.js";
import { buildMethodGroups } from "../dispatch/method-groups.js";
import { rebindRawMethods } from "../generics/closure.js";
import { describeError } from "../host/errors.js";
import { fail } from "../host/reporting.js";
import { fixupInterfaces } from "../interfaces/conformance.js";
import { lookupFunction } from "../model/member-table.js";
import type { TypeDescriptor, TypeRuntime } from "../model/types.js";
import { STATIC_CONSTRUCTOR_KEYS } from "../naming/names.js";
import { instantiateProperties } from "./properties.js";

const runStaticConstructors = (runtime: TypeRuntime, type: TypeDescriptor): void => {
  const publicInterface = type.publicInterface;
  for (const key of STATIC_CONSTRUCTOR_KEYS) {
    const cctor = publicInterface.staticTable.entries.has(key)
      ? lookupFunction(publicInterface.staticTable, key)
      : undefined;
    if (!cctor) continue;

    try {
      cctor.invoke(publicInterface, []);
    } catch (failure) {
      throw fail(
        runtime,
        "TFG3007",
        `The type initializer for '${type.fullName}' threw an exception: ${describeError(failure)}`,
        { subject: type.fullName, cause: failure }
      );
    }
  }
};

export const initializeType = (runtime: TypeRuntime, type: TypeDescriptor): void => {
  if (type.initialized) return;
  type.initialized = true;

  const isInterface = type.typeKind === "interface";

  if (type.isClosed) {
    if (!isInterface) buildMethodGroups(runtime, type);
    instantiateProperties(type);
    if (!isInterface) {
      fixupInterfaces(runtime, type);
      for (const initializeFields of type.fieldsToInitialize) {
        initializeFields(type);
      }
      rebindRawMethods(type);
    }
    buildAssignableSet(runtime, type);
  }

  while (type.initializers.length > 0) {
    type.initializers.shift()?.(type);
  }

  if (type.isClosed) {
    runStaticConstructors(runtime, type);
  }

  for (const closed of type.closedTypes.values()) {
    initializeType(runtime, closed);
  }
  if (type.baseType) {
    initializeType(runtime, type.baseType);
  }
};
