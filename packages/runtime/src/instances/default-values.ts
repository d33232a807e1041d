/**
 * Default values of types
 */

import { CORLIB } from "../corlib/lookup.js";
import type { TypeDescriptor, TypeRuntime } from "../model/types.js";
import { construct, isInstanceStruct } from "./construct.js";
import { createEnumValue } from "./enum-values.js";

/**
 * The zero value: 0 for numbers and enums, false, the NUL char, a fresh
 * default struct, or null for reference types.
 */
export const defaultValue = (runtime: TypeRuntime, type: TypeDescriptor): unknown => {
  if (type.typeKind === "enum") return createEnumValue(type, 0);
  if (type.isNumeric) return 0;
  if (type.isNativeType) {
    switch (type.fullNameWithoutArguments) {
      case CORLIB.boolean:
        return false;
      case CORLIB.char:
        return "\0";
      default:
        return null;
    }
  }
  if (isInstanceStruct(type) && type.isClosed) return construct(runtime, type);
  return null;
};
