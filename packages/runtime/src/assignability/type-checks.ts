/**
 * Runtime value checks: getType, checkType, tryCast and cast
 */

import { CORLIB, findCorlibType, runtimeTypeOf } from "../corlib/lookup.js";
import { fail } from "../host/reporting.js";
import { createEnumValue } from "../instances/enum-values.js";
import {
  isDelegateValue,
  isEnumValue,
  isPublicInterface,
  isRuntimeObject,
  isTypeDescriptor,
} from "../model/guards.js";
import { derivesFromTable, isRuntimeFunction } from "../model/member-table.js";
import type { TypeDescriptor, TypeRuntime } from "../model/types.js";
import { isAssignable } from "./assignable-set.js";

/**
 * The runtime type of a value, or null for undefined and null.
 */
export const getType = (
  runtime: TypeRuntime,
  value: unknown
): TypeDescriptor | null => {
  if (value === null || value === undefined) return null;

  if (isRuntimeObject(value) || isEnumValue(value) || isDelegateValue(value)) {
    return value.type;
  }
  if (isTypeDescriptor(value)) return runtimeTypeOf(runtime, value);
  if (isPublicInterface(value)) return runtimeTypeOf(runtime, value.descriptor);

  switch (typeof value) {
    case "string":
      return findCorlibType(runtime, CORLIB.string);
    case "number":
      return findCorlibType(runtime, CORLIB.double);
    case "boolean":
      return findCorlibType(runtime, CORLIB.boolean);
    default:
      return Array.isArray(value)
        ? findCorlibType(runtime, CORLIB.array)
        : findCorlibType(runtime, CORLIB.object);
  }
};

export const getTypeName = (runtime: TypeRuntime, value: unknown): string =>
  getType(runtime, value)?.fullName ?? (value === null ? "null" : typeof value);

/**
 * A bespoke check declared by the type: built in for enums, arrays and
 * delegates, or a static `CheckType` raw method.
 */
const customCheck = (
  type: TypeDescriptor
): ((value: unknown) => boolean) | null => {
  if (type.customCheck) return type.customCheck;

  for (const owner of [type, type.openType]) {
    const entry = owner?.publicInterface.staticTable.entries.get("CheckType");
    if (entry?.kind === "function") {
      const fn = entry.fn;
      return (value) => fn.invoke(type.publicInterface, [value]) === true;
    }
  }
  return null;
};

export const checkType = (
  runtime: TypeRuntime,
  value: unknown,
  expected: TypeDescriptor,
  bypassCustomCheck = false
): boolean => {
  if (value === null || value === undefined) return false;
  if (expected.typeKind === "any") return true;

  if (expected.typeKind === "enum") {
    return isEnumValue(value) && value.type.typeId === expected.typeId;
  }
  if (expected.typeKind === "array") {
    return Array.isArray(value);
  }

  if (!bypassCustomCheck) {
    const check = customCheck(expected);
    if (check) return check(value);
  }

  const valueType = getType(runtime, value);
  if (valueType?.assignableTypes) {
    return valueType.assignableTypes.has(expected.typeId);
  }

  // Slow path: walk the instance's template chain.
  const template = expected.publicInterface.instanceTemplate;
  if (isRuntimeObject(value) && template) {
    return derivesFromTable(value.template, template);
  }

  return valueType !== null && !isRuntimeFunction(value)
    ? isAssignable(runtime, valueType, expected)
    : false;
};

export const tryCast = (
  runtime: TypeRuntime,
  value: unknown,
  expected: TypeDescriptor
): unknown => {
  if (!expected.isReferenceType) {
    throw fail(
      runtime,
      "TFG2006",
      `Cannot try-cast to value type '${expected.fullName}'.`,
      { subject: expected.fullName }
    );
  }
  return checkType(runtime, value, expected) ? value : null;
};

export const cast = (
  runtime: TypeRuntime,
  value: unknown,
  expected: TypeDescriptor
): unknown => {
  if (value === null || value === undefined) return null;

  if (expected.typeKind === "enum") {
    if (isEnumValue(value) && value.type.typeId === expected.typeId) return value;
    return createEnumValue(expected, isEnumValue(value) ? value.value : Number(value));
  }

  if (checkType(runtime, value, expected)) {
    return expected.isIntegral && typeof value === "number"
      ? Math.floor(value)
      : value;
  }

  throw fail(
    runtime,
    "TFG2006",
    `Unable to cast object of type '${getTypeName(runtime, value)}' to type '${expected.fullName}'.`,
    { subject: expected.fullName }
  );
};
