/**
 * Type declarations
 *
 * `makeClass`, `makeStruct`, `makeInterface` and `makeStaticClass` register a
 * type under its name. Nothing is built until the returned handle (or any
 * other lookup of the name) is dereferenced: then the descriptor is created,
 * externals are applied and the initializer declares the members through a
 * `TypeBuilder`. Initialization proper follows on the first access after the
 * registrations are sealed, or on first construction.
 */

import { createTypeBuilder, type TypeBuilder } from "../builder/type-builder.js";
import { CORLIB, findCorlibType, resolveRuntimeType } from "../corlib/lookup.js";
import { applyExternals } from "../externals/externals.js";
import { resolveTypeReference } from "../generics/resolve.js";
import { fail } from "../host/reporting.js";
import { assignTypeId } from "../identity/type-ids.js";
import { initializeType } from "../initialization/initialize-type.js";
import { createTypeDescriptor } from "../model/descriptors.js";
import { describeTypeReference } from "../model/type-refs.js";
import type {
  LoadUnit,
  PublicInterface,
  TypeDescriptor,
  TypeKind,
  TypeReference,
  TypeRuntime,
} from "../model/types.js";
import { registerName, resolveType, type TypeHandle } from "../registry/name-registry.js";

export type TypeDeclaration = {
  readonly name: string;
  readonly isPublic: boolean;
  /** Omitted: the kind's default base. null: no base at all. */
  readonly baseType?: TypeReference | null;
  readonly genericParameters?: readonly string[];
  readonly interfaces?: readonly TypeReference[];
  readonly initializer?: (builder: TypeBuilder) => void;
};

/** How a kind of type is laid out. */
export type TypeShape = {
  readonly typeKind: TypeKind;
  readonly isReferenceType: boolean;
  readonly hasInstances: boolean;
  readonly defaultBase: string | null;
  /** Runs on the new descriptor, before externals are applied. */
  readonly configure?: (type: TypeDescriptor) => void;
};

const CLASS_SHAPE: TypeShape = {
  typeKind: "class",
  isReferenceType: true,
  hasInstances: true,
  defaultBase: CORLIB.object,
};

const STRUCT_SHAPE: TypeShape = {
  typeKind: "struct",
  isReferenceType: false,
  hasInstances: true,
  defaultBase: CORLIB.valueType,
};

const STATIC_SHAPE: TypeShape = {
  typeKind: "static",
  isReferenceType: true,
  hasInstances: false,
  defaultBase: CORLIB.object,
};

const INTERFACE_SHAPE: TypeShape = {
  typeKind: "interface",
  isReferenceType: true,
  hasInstances: true,
  defaultBase: null,
};

const resolveBaseType = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  declaration: TypeDeclaration,
  shape: TypeShape
): TypeDescriptor | null => {
  if (declaration.baseType === null) return null;
  if (declaration.baseType === undefined) {
    if (shape.defaultBase === null || shape.defaultBase === declaration.name) return null;
    return findCorlibType(runtime, shape.defaultBase);
  }

  const base = resolveTypeReference(runtime, declaration.baseType, loadUnit);
  if (base.kind !== "type") {
    throw fail(
      runtime,
      "TFG2001",
      `The base type '${describeTypeReference(declaration.baseType)}' of '${declaration.name}' is not a type.`,
      { subject: declaration.name }
    );
  }
  return base;
};

/**
 * Build the descriptor of a declared type. The registry calls this exactly
 * once per binding.
 */
export const createDeclaredType = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  declaration: TypeDeclaration,
  shape: TypeShape
): PublicInterface => {
  const runtimeType = resolveRuntimeType(runtime, declaration.name);
  const baseType = resolveBaseType(runtime, loadUnit, declaration, shape);
  const baseTemplate = baseType?.publicInterface.instanceTemplate ?? null;

  const type = createTypeDescriptor({
    typeKind: shape.typeKind,
    loadUnit,
    fullName: declaration.name,
    typeId: assignTypeId(runtime, loadUnit, declaration.name),
    isReferenceType: shape.isReferenceType,
    isStruct: !shape.isReferenceType,
    baseType,
    interfaces: declaration.interfaces,
    genericParameterNames: declaration.genericParameters,
    renamedMethods: baseType?.renamedMethods,
    staticParent: null,
    templateParent: shape.hasInstances ? baseTemplate : undefined,
  });
  type.runtimeType = runtimeType;
  shape.configure?.(type);

  if (shape.typeKind !== "interface") applyExternals(runtime, type);
  return type.publicInterface;
};

/**
 * Register a type of the given shape and return a handle to it.
 */
export const makeType = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  declaration: TypeDeclaration,
  shape: TypeShape
): TypeHandle => {
  const initializer = declaration.initializer;
  registerName(runtime, loadUnit, {
    name: declaration.name,
    isPublic: declaration.isPublic,
    creator: () => createDeclaredType(runtime, loadUnit, declaration, shape),
    initializer: initializer
      ? (publicInterface) => initializer(createTypeBuilder(runtime, publicInterface.descriptor))
      : null,
    activate: (publicInterface) => initializeType(runtime, publicInterface.descriptor),
  });
  return resolveType(runtime, declaration.name, loadUnit);
};

export const makeClass = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  declaration: TypeDeclaration
): TypeHandle => makeType(runtime, loadUnit, declaration, CLASS_SHAPE);

export const makeStruct = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  declaration: TypeDeclaration
): TypeHandle => makeType(runtime, loadUnit, declaration, STRUCT_SHAPE);

/** A class with static members only. */
export const makeStaticClass = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  declaration: TypeDeclaration
): TypeHandle => makeType(runtime, loadUnit, declaration, STATIC_SHAPE);

export const makeInterface = (
  runtime: TypeRuntime,
  loadUnit: LoadUnit,
  declaration: TypeDeclaration
): TypeHandle => makeType(runtime, loadUnit, { ...declaration, baseType: null }, INTERFACE_SHAPE);
