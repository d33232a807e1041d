/**
 * Type guards for runtime values
 */

import type {
  DelegateValue,
  EnumValue,
  GenericParameter,
  LoadUnit,
  PositionalGenericParameter,
  PublicInterface,
  RuntimeObject,
  TypeDescriptor,
  TypeRef,
} from "./types.js";

const hasKind = (value: unknown, kind: string): boolean =>
  typeof value === "object" &&
  value !== null &&
  "kind" in value &&
  value.kind === kind;

export const isPublicInterface = (value: unknown): value is PublicInterface =>
  hasKind(value, "publicInterface");

export const isTypeDescriptor = (value: unknown): value is TypeDescriptor =>
  hasKind(value, "type");

export const isRuntimeObject = (value: unknown): value is RuntimeObject =>
  hasKind(value, "instance");

export const isEnumValue = (value: unknown): value is EnumValue =>
  hasKind(value, "enumValue");

export const isDelegateValue = (value: unknown): value is DelegateValue =>
  hasKind(value, "delegate");

export const isTypeRef = (value: unknown): value is TypeRef =>
  hasKind(value, "typeRef");

export const isGenericParameter = (value: unknown): value is GenericParameter =>
  hasKind(value, "genericParameter");

export const isPositionalParameter = (
  value: unknown
): value is PositionalGenericParameter => hasKind(value, "positionalParameter");

export const isLoadUnit = (value: unknown): value is LoadUnit =>
  hasKind(value, "loadUnit");
