/**
 * Array types
 *
 * One array type per element type, created on demand and cached on the
 * runtime. Array values are host arrays.
 */

import { CORLIB, findCorlibType, resolveRuntimeType } from "../corlib/lookup.js";
import { initializeType } from "../initialization/initialize-type.js";
import { requireCoreLoadUnit } from "../identity/load-units.js";
import { defaultValue } from "../instances/default-values.js";
import { createTypeDescriptor } from "../model/descriptors.js";
import type { TypeDescriptor, TypeRuntime } from "../model/types.js";

export const arrayTypeOf = (
  runtime: TypeRuntime,
  elementType: TypeDescriptor
): TypeDescriptor => {
  const cached = runtime.arrayTypes.get(elementType.typeId);
  if (cached) return cached;

  const baseType = findCorlibType(runtime, CORLIB.array);
  const fullName = `${elementType.fullName}[]`;
  const type = createTypeDescriptor({
    typeKind: "array",
    loadUnit: requireCoreLoadUnit(runtime),
    fullName,
    typeId: `${elementType.typeId}[]`,
    isReferenceType: true,
    baseType,
    staticParent: null,
    templateParent: baseType?.publicInterface.instanceTemplate ?? null,
  });
  type.elementType = elementType;
  type.isClosed = elementType.isClosed;
  type.runtimeType = resolveRuntimeType(runtime, fullName);

  runtime.arrayTypes.set(elementType.typeId, type);
  initializeType(runtime, type);
  return type;
};

/**
 * A new array of `length` default values of the element type.
 */
export const newArray = (
  runtime: TypeRuntime,
  elementType: TypeDescriptor,
  length: number
): unknown[] => Array.from({ length }, () => defaultValue(runtime, elementType));
