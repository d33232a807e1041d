/**
 * Enum values
 */

import { isEnumValue } from "../model/guards.js";
import type { EnumValue, TypeDescriptor } from "../model/types.js";

/**
 * The canonical value for a named member, or a fresh value for any other
 * number (flags combinations, out-of-range casts).
 */
export const createEnumValue = (
  type: TypeDescriptor,
  value: number
): EnumValue => {
  const name = type.enumInfo?.valueToName.get(value) ?? null;
  const named = name === null ? undefined : type.publicInterface.fields.get(name);
  if (isEnumValue(named) && named.value === value) {
    return named;
  }
  return { kind: "enumValue", type, value, name };
};

export const enumValueToString = (value: EnumValue): string => {
  if (value.name !== null) return value.name;
  const info = value.type.enumInfo;
  if (!info?.isFlags) return String(value.value);

  const parts = info.names.filter((name) => {
    const bits = info.values.get(name) ?? 0;
    return bits !== 0 && (value.value & bits) === bits;
  });
  return parts.length > 0 ? parts.join(", ") : String(value.value);
};
