/**
 * Declaring the types of a manifest
 *
 * Every manifest method is declared external: it stays a placeholder until
 * an implementation is supplied, either through `externals` here or through
 * `implementExternals` before the type is first used.
 */

import type { TypeBuilder } from "../builder/type-builder.js";
import { makeDelegate } from "../definitions/delegates.js";
import { makeEnum } from "../definitions/enums.js";
import { implementExternals } from "../definitions/implement-externals.js";
import {
  makeClass,
  makeInterface,
  makeStaticClass,
  makeStruct,
  type TypeDeclaration,
} from "../definitions/make-type.js";
import { fail } from "../host/reporting.js";
import { declareLoadUnit } from "../identity/load-units.js";
import { parseTypeName, type ParsedTypeName } from "../lookup/type-names.js";
import { createGenericParameter, createTypeRef } from "../model/type-refs.js";
import type { LoadUnit, TypeReference, TypeRuntime } from "../model/types.js";
import type { TypeHandle } from "../registry/name-registry.js";
import type { Manifest, ManifestType } from "./types.js";

/** Native member implementations, by type name. */
export type ManifestExternals = Readonly<Record<string, (builder: TypeBuilder) => void>>;

type ReferenceScope = {
  readonly runtime: TypeRuntime;
  readonly loadUnit: LoadUnit;
  readonly owner: string;
  readonly typeParameters: readonly string[];
  readonly methodParameters: readonly string[];
};

const fromParsed = (scope: ReferenceScope, parsed: ParsedTypeName, text: string): TypeReference => {
  if (parsed.arrayRank > 0) {
    throw fail(
      scope.runtime,
      "TFG9010",
      `Array type '${text}' cannot be referenced from a manifest.`,
      { subject: scope.owner }
    );
  }

  const isBareName = parsed.genericArguments.length === 0 && parsed.loadUnit === null;
  if (isBareName) {
    const position = scope.methodParameters.indexOf(parsed.name);
    if (position >= 0) return `!!${position}`;
    if (scope.typeParameters.includes(parsed.name)) {
      return createGenericParameter(scope.runtime, scope.owner, parsed.name);
    }
  }

  const context =
    parsed.loadUnit === null ? scope.loadUnit : declareLoadUnit(scope.runtime, parsed.loadUnit);
  return createTypeRef(
    scope.runtime,
    context,
    parsed.name,
    parsed.genericArguments.map((argument) => fromParsed(scope, argument, text))
  );
};

/**
 * Turn a manifest type string into a type reference.
 */
export const manifestTypeReference = (scope: ReferenceScope, text: string): TypeReference => {
  if (/^!!\d+$/.test(text)) return text;
  const parsed = parseTypeName(text);
  if (!parsed) {
    throw fail(scope.runtime, "TFG9010", `'${text}' is not a valid type reference.`, {
      subject: scope.owner,
    });
  }
  return fromParsed(scope, parsed, text);
};

const declareMembers = (
  scope: ReferenceScope,
  declared: ManifestType,
  builder: TypeBuilder
): void => {
  const ref = (text: string, methodParameters: readonly string[] = []) =>
    manifestTypeReference({ ...scope, methodParameters }, text);

  for (const field of declared.fields) {
    builder.field({ isStatic: field.static, isPublic: field.public }, field.name, ref(field.type));
  }
  for (const method of declared.methods) {
    const generics = method.genericParameters;
    builder.externalMethod(
      { isStatic: method.static, isPublic: method.public },
      method.name,
      builder.signature(
        method.returnType === null ? null : ref(method.returnType, generics),
        method.parameters.map((parameter) => ref(parameter, generics)),
        generics
      )
    );
  }
  for (const property of declared.properties) {
    builder.property({ isStatic: property.static, isPublic: property.public }, property.name);
  }
};

const declareType = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  declared: ManifestType
): TypeHandle => {
  const scope: ReferenceScope = {
    runtime,
    loadUnit,
    owner: declared.name,
    typeParameters: declared.genericParameters,
    methodParameters: [],
  };

  const declaration: TypeDeclaration = {
    name: declared.name,
    isPublic: declared.public,
    genericParameters: declared.genericParameters,
    interfaces: declared.interfaces.map((text) => manifestTypeReference(scope, text)),
    ...(declared.baseType === null
      ? {}
      : { baseType: manifestTypeReference(scope, declared.baseType) }),
    initializer: (builder) => declareMembers(scope, declared, builder),
  };

  switch (declared.kind) {
    case "class":
      return makeClass(runtime, loadUnit, declaration);
    case "struct":
      return makeStruct(runtime, loadUnit, declaration);
    case "static":
      return makeStaticClass(runtime, loadUnit, declaration);
    case "interface":
      return makeInterface(runtime, loadUnit, declaration);
    case "delegate":
      return makeDelegate(runtime, loadUnit, declaration);
    case "enum":
      return makeEnum(runtime, loadUnit, {
        ...declaration,
        members: declared.members,
        isFlags: declared.flags,
      });
  }
};

/**
 * Declare every type of a manifest in its load unit. Nothing is built until
 * a returned handle, or a lookup of a declared name, is dereferenced.
 */
export const registerManifest = (
  runtime: TypeRuntime,
  manifest: Manifest,
  externals: ManifestExternals = {}
): readonly TypeHandle[] => {
  const loadUnit = declareLoadUnit(runtime, manifest.loadUnit);

  for (const [typeName, define] of Object.entries(externals)) {
    implementExternals(runtime, loadUnit, typeName, define);
  }

  return manifest.types.map((declared) => declareType(runtime, loadUnit, declared));
};
