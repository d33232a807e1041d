/**
 * Enumerations
 *
 * Each named member has one canonical `EnumValue`, stored in the type's
 * fields under its name. Casting any other number produces a fresh value
 * that compares by number.
 */

import { CORLIB } from "../corlib/lookup.js";
import { fail } from "../host/reporting.js";
import { createEnumValue, enumValueToString } from "../instances/enum-values.js";
import { isEnumValue } from "../model/guards.js";
import { setEntry, valueEntry } from "../model/member-table.js";
import type {
  EnumInfo,
  EnumValue,
  LoadUnit,
  TypeDescriptor,
  TypeRuntime,
} from "../model/types.js";
import type { TypeHandle } from "../registry/name-registry.js";
import { makeType, type TypeDeclaration } from "./make-type.js";

export type EnumMember = {
  readonly name: string;
  readonly value: number;
};

export type EnumDeclaration = Omit<TypeDeclaration, "baseType" | "genericParameters"> & {
  readonly members: readonly EnumMember[];
  readonly isFlags?: boolean;
};

const createEnumInfo = (members: readonly EnumMember[], isFlags: boolean): EnumInfo => {
  const values = new Map<string, number>();
  const valueToName = new Map<number, string>();
  for (const member of members) {
    values.set(member.name, member.value);
    // The first name declared for a value is the one it prints as.
    if (!valueToName.has(member.value)) valueToName.set(member.value, member.name);
  }
  return { isFlags, names: members.map((member) => member.name), values, valueToName };
};

const installMembers = (type: TypeDescriptor, members: readonly EnumMember[]): void => {
  const publicInterface = type.publicInterface;
  for (const member of members) {
    const value: EnumValue = {
      kind: "enumValue",
      type,
      value: member.value,
      name: type.enumInfo?.valueToName.get(member.value) ?? member.name,
    };
    publicInterface.fields.set(member.name, value);
    setEntry(publicInterface.staticTable, member.name, valueEntry(value));
  }
};

export const makeEnum = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  declaration: EnumDeclaration
): TypeHandle =>
  makeType(runtime, loadUnit, declaration, {
    typeKind: "enum",
    isReferenceType: false,
    hasInstances: true,
    defaultBase: CORLIB.enum,
    configure: (type) => {
      type.enumInfo = createEnumInfo(declaration.members, declaration.isFlags ?? false);
      installMembers(type, declaration.members);
    },
  });

/** The canonical value of a named member. */
export const enumValue = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  name: string
): EnumValue => {
  const value = type.publicInterface.fields.get(name);
  if (type.typeKind === "enum" && isEnumValue(value)) return value;
  throw fail(runtime, "TFG2007", `Enum '${type.fullName}' has no member named '${name}'.`, {
    subject: type.fullName,
  });
};

/** Combine members of a flags enum. */
export const enumFlags = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  ...names: string[]
): EnumValue => {
  if (!type.enumInfo?.isFlags) {
    throw fail(
      runtime,
      "TFG2002",
      `Enum '${type.fullName}' is not a flags enum; its members cannot be combined.`,
      { subject: type.fullName }
    );
  }
  const combined = names.reduce(
    (bits, name) => bits | enumValue(runtime, type, name).value,
    0
  );
  return createEnumValue(type, combined);
};

export const enumValueName = (value: EnumValue): string => enumValueToString(value);
