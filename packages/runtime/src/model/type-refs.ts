/**
 * Type references: named and positional generic parameters, lazily resolved
 * type refs, and the identity strings built from them.
 */

import { fail } from "../host/reporting.js";
import {
  assignTypeId,
  genericParameterTypeId,
  positionalParameterTypeId,
} from "../identity/type-ids.js";
import { qualifiedKey } from "../naming/names.js";
import type {
  GenericParameter,
  LoadUnit,
  PositionalGenericParameter,
  TypeReference,
  TypeRef,
  TypeRuntime,
} from "./types.js";

export const createGenericParameter = (
  runtime: TypeRuntime,
  owner: string,
  name: string
): GenericParameter => ({
  kind: "genericParameter",
  name,
  owner,
  key: qualifiedKey(owner, name),
  typeId: genericParameterTypeId(runtime, owner, name),
});

export const createPositionalParameter = (
  index: number
): PositionalGenericParameter => ({
  kind: "positionalParameter",
  index,
  typeId: positionalParameterTypeId(index),
});

/** Index of a `!!n` name, or undefined for any other name. */
export const parsePositionalName = (name: string): number | undefined => {
  const match = /^!!(\d+)$/.exec(name);
  return match?.[1] === undefined ? undefined : Number(match[1]);
};

/**
 * Check a caller-supplied argument list for undefined or null entries.
 */
export const requireTypeArguments = (
  runtime: TypeRuntime,
  args: readonly (TypeReference | null | undefined)[],
  subject: string
): readonly TypeReference[] => {
  const checked: TypeReference[] = [];
  args.forEach((arg, index) => {
    if (arg === null || arg === undefined) {
      throw fail(
        runtime,
        "TFG2002",
        `Generic argument #${index} of '${subject}' is ${arg === null ? "null" : "undefined"}.`,
        { subject }
      );
    }
    checked.push(arg);
  });
  return checked;
};

export const createTypeRef = (
  runtime: TypeRuntime,
  context: LoadUnit,
  typeName: string,
  genericArguments: readonly (TypeReference | null | undefined)[] = []
): TypeRef => ({
  kind: "typeRef",
  context,
  typeName,
  genericArguments: requireTypeArguments(runtime, genericArguments, typeName),
  cached: null,
});

/**
 * Identity string of a reference, without constructing the type it names.
 */
export const typeReferenceId = (
  runtime: TypeRuntime,
  ref: TypeReference,
  context: LoadUnit
): string => {
  if (typeof ref === "string") {
    const position = parsePositionalName(ref);
    return position === undefined
      ? assignTypeId(runtime, context, ref)
      : positionalParameterTypeId(position);
  }

  switch (ref.kind) {
    case "typeRef":
      return typeRefTypeId(runtime, ref);
    case "genericParameter":
    case "positionalParameter":
      return ref.typeId;
    case "type":
      return ref.typeId;
    case "publicInterface":
      return ref.descriptor.typeId;
  }
};

export const typeRefTypeId = (runtime: TypeRuntime, ref: TypeRef): string => {
  if (ref.cached) return ref.cached.descriptor.typeId;

  const openId = assignTypeId(runtime, ref.context, ref.typeName);
  return ref.genericArguments.length > 0
    ? `${openId}[${hashTypeArgumentArray(runtime, ref.genericArguments, ref.context)}]`
    : openId;
};

/**
 * Hash of an ordered argument list: "void" when empty, otherwise the
 * argument identities joined with commas.
 */
export const hashTypeArgumentArray = (
  runtime: TypeRuntime,
  args: readonly TypeReference[],
  context: LoadUnit
): string =>
  args.length === 0
    ? "void"
    : args.map((arg) => typeReferenceId(runtime, arg, context)).join(",");

/** Readable name of a reference, for signatures and messages. */
export const describeTypeReference = (ref: TypeReference): string => {
  if (typeof ref === "string") return ref;

  switch (ref.kind) {
    case "typeRef":
      return ref.genericArguments.length > 0
        ? `${ref.typeName}[${ref.genericArguments.map(describeTypeReference).join(", ")}]`
        : ref.typeName;
    case "genericParameter":
      return ref.name;
    case "positionalParameter":
      return `!!${ref.index}`;
    case "type":
      return ref.fullName;
    case "publicInterface":
      return ref.descriptor.fullName;
  }
};
