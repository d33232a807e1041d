/**
 * Access to the built-in types of the core load unit
 */

import { createTypeDescriptor } from "../model/descriptors.js";
import type { TypeDescriptor, TypeRuntime } from "../model/types.js";
import { bindingState } from "../registry/name-registry.js";

export const CORLIB = {
  object: "System.Object",
  valueType: "System.ValueType",
  enum: "System.Enum",
  memberInfo: "System.Reflection.MemberInfo",
  type: "System.Type",
  runtimeType: "System.RuntimeType",
  string: "System.String",
  boolean: "System.Boolean",
  char: "System.Char",
  double: "System.Double",
  single: "System.Single",
  int32: "System.Int32",
  array: "System.Array",
  delegate: "System.Delegate",
  multicastDelegate: "System.MulticastDelegate",
} as const;

/** Types built from the stub runtime type until the root exists. */
const BOOTSTRAP_TYPES: ReadonlySet<string> = new Set([
  CORLIB.runtimeType,
  CORLIB.type,
  CORLIB.memberInfo,
  CORLIB.object,
]);

/**
 * A built-in type if it is registered and not currently being built.
 * Constructs but never initializes.
 */
export const findCorlibType = (
  runtime: TypeRuntime,
  name: string
): TypeDescriptor | null => {
  const core = runtime.coreLoadUnit;
  if (!core) return null;
  const getter = core.typesByName.get(name);
  if (!getter) return null;

  const state = bindingState(runtime, core, name);
  if (state === "constructing" || state === "failed") return null;
  return getter(false).descriptor;
};

export const getStubRuntimeType = (runtime: TypeRuntime): TypeDescriptor => {
  if (runtime.stubRuntimeType) return runtime.stubRuntimeType;
  const core = runtime.coreLoadUnit;
  if (!core) {
    throw new Error("Runtime has no core load unit.");
  }
  const stub = createTypeDescriptor({
    typeKind: "class",
    loadUnit: core,
    fullName: CORLIB.runtimeType,
    typeId: "stub",
    isReferenceType: true,
    templateParent: null,
  });
  runtime.stubRuntimeType = stub;
  return stub;
};

/**
 * The runtime type to record for a type being constructed. The root and the
 * reflection types get a stub while the root is still being built.
 */
export const resolveRuntimeType = (
  runtime: TypeRuntime,
  forTypeName: string
): TypeDescriptor => {
  if (BOOTSTRAP_TYPES.has(forTypeName) && !runtime.rootInitialized) {
    return getStubRuntimeType(runtime);
  }
  return findCorlibType(runtime, CORLIB.runtimeType) ?? getStubRuntimeType(runtime);
};

/**
 * The runtime type of a type. A stub recorded during bootstrap is replaced by
 * the real one as soon as it can be built.
 */
export const runtimeTypeOf = (
  runtime: TypeRuntime,
  type: TypeDescriptor
): TypeDescriptor => {
  const current = type.runtimeType;
  if (current && current !== runtime.stubRuntimeType) return current;

  const resolved = resolveRuntimeType(runtime, type.fullName);
  type.runtimeType = resolved;
  return resolved;
};
