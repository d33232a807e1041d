/**
 * Resolution of type references and generic parameters
 */

import { createSignature } from "../model/method-signature.js";
import {
  createPositionalParameter,
  parsePositionalName,
  requireTypeArguments,
} from "../model/type-refs.js";
import type {
  LoadUnit,
  MethodSignature,
  PublicInterface,
  TypeArgument,
  TypeDescriptor,
  TypeReference,
  TypeRef,
  TypeRuntime,
} from "../model/types.js";
import { getTypeByName, resolveType } from "../registry/name-registry.js";
import { closeType } from "./closure.js";

const MAX_BINDING_DEPTH = 32;

/**
 * Dereference a type ref, closing it over its generic arguments. The result
 * is cached on the ref.
 */
export const typeRefGet = (runtime: TypeRuntime, ref: TypeRef): PublicInterface => {
  if (ref.cached) return ref.cached;

  const open = resolveType(runtime, ref.typeName, ref.context).get();
  if (ref.genericArguments.length === 0) {
    ref.cached = open;
    return open;
  }

  const args = ref.genericArguments.map((arg): TypeReference => {
    if (typeof arg !== "string") return arg;
    const position = parsePositionalName(arg);
    return position === undefined
      ? { kind: "typeRef", context: ref.context, typeName: arg, genericArguments: [], cached: null }
      : createPositionalParameter(position);
  });
  const closed = closeType(runtime, open.descriptor, args, false);
  ref.cached = closed.publicInterface;
  return closed.publicInterface;
};

/**
 * Resolve a reference to a descriptor or generic parameter. Named types are
 * constructed but not initialized.
 */
export const resolveTypeReference = (
  runtime: TypeRuntime,
  ref: TypeReference,
  context: LoadUnit
): TypeArgument => {
  if (typeof ref === "string") {
    const position = parsePositionalName(ref);
    return position === undefined
      ? getTypeByName(runtime, ref, context).descriptor
      : createPositionalParameter(position);
  }

  switch (ref.kind) {
    case "typeRef":
      return typeRefGet(runtime, ref).descriptor;
    case "publicInterface":
      return ref.descriptor;
    default:
      return ref;
  }
};

export const resolveTypeArgumentArray = (
  runtime: TypeRuntime,
  args: readonly (TypeReference | null | undefined)[],
  context: LoadUnit,
  subject: string
): readonly TypeArgument[] =>
  requireTypeArguments(runtime, args, subject).map((arg) =>
    resolveTypeReference(runtime, arg, context)
  );

/**
 * Bound value of a generic parameter key, searched along the base chain.
 */
export const lookupGenericBinding = (
  type: TypeDescriptor,
  key: string
): TypeArgument | undefined => {
  for (
    let current: TypeDescriptor | null = type;
    current !== null;
    current = current.baseType
  ) {
    const bound = current.genericBindings.get(key);
    if (bound !== undefined) return bound;
  }
  return undefined;
};

/**
 * Substitute generic parameters in an already resolved argument. Open
 * instantiations whose arguments change are closed again.
 */
export const resolveGenericArgument = (
  runtime: TypeRuntime,
  arg: TypeArgument,
  context: TypeDescriptor,
  depth = 0
): TypeArgument => {
  if (depth > MAX_BINDING_DEPTH) return arg;

  switch (arg.kind) {
    case "genericParameter": {
      const bound = lookupGenericBinding(context, arg.key);
      if (
        bound === undefined ||
        (bound.kind === "genericParameter" && bound.key === arg.key)
      ) {
        return arg;
      }
      return resolveGenericArgument(runtime, bound, context, depth + 1);
    }
    case "positionalParameter":
      return arg;
    case "type": {
      const openType = arg.openType;
      if (arg.isClosed || openType === null || arg.genericArgumentValues.length === 0) {
        return arg;
      }
      const resolved = arg.genericArgumentValues.map((value) =>
        resolveGenericArgument(runtime, value, context, depth + 1)
      );
      if (resolved.every((value, i) => value === arg.genericArgumentValues[i])) {
        return arg;
      }
      return closeType(runtime, openType, resolved, true);
    }
  }
};

/**
 * Substitute generic parameters in an unresolved reference. Names stay
 * names and type refs stay type refs, so nothing is constructed.
 */
export const resolveGenericReference = (
  runtime: TypeRuntime,
  ref: TypeReference,
  context: TypeDescriptor
): TypeReference => {
  if (typeof ref === "string") return ref;

  switch (ref.kind) {
    case "typeRef": {
      const args = ref.genericArguments.map((arg) =>
        resolveGenericReference(runtime, arg, context)
      );
      if (args.every((arg, i) => arg === ref.genericArguments[i])) return ref;
      return {
        kind: "typeRef",
        context: ref.context,
        typeName: ref.typeName,
        genericArguments: args,
        cached: null,
      };
    }
    case "publicInterface": {
      const resolved = resolveGenericArgument(runtime, ref.descriptor, context);
      return resolved === ref.descriptor ? ref : resolved;
    }
    default:
      return resolveGenericArgument(runtime, ref, context);
  }
};

/**
 * Resolve a reference declared by `declaringType` as seen from `context`
 * (the declaring type itself or a closed type deriving from it).
 */
export const resolveInContext = (
  runtime: TypeRuntime,
  ref: TypeReference,
  declaringType: TypeDescriptor,
  context: TypeDescriptor = declaringType
): TypeArgument =>
  resolveGenericArgument(
    runtime,
    resolveTypeReference(
      runtime,
      resolveGenericReference(runtime, ref, context),
      declaringType.loadUnit
    ),
    context
  );

/**
 * Signature with enclosing generic parameters substituted, or null when
 * nothing changed.
 */
export const resolveGenericMethodSignature = (
  runtime: TypeRuntime,
  signature: MethodSignature,
  context: TypeDescriptor
): MethodSignature | null => {
  const returnType =
    signature.returnType === null
      ? null
      : resolveGenericReference(runtime, signature.returnType, context);
  const argumentTypes = signature.argumentTypes.map((arg) =>
    resolveGenericReference(runtime, arg, context)
  );

  const changed =
    returnType !== signature.returnType ||
    argumentTypes.some((arg, i) => arg !== signature.argumentTypes[i]);

  return changed
    ? createSignature(
        signature.context,
        returnType,
        argumentTypes,
        signature.genericArgumentNames
      )
    : null;
};

export type ResolvedSignature = {
  readonly returnType: TypeArgument | null;
  readonly argumentTypes: readonly TypeArgument[];
};

/**
 * Resolve every type a signature mentions, as seen from `context`.
 */
export const resolveSignature = (
  runtime: TypeRuntime,
  signature: MethodSignature,
  declaringType: TypeDescriptor,
  context: TypeDescriptor = declaringType
): ResolvedSignature => ({
  returnType:
    signature.returnType === null
      ? null
      : resolveInContext(runtime, signature.returnType, declaringType, context),
  argumentTypes: signature.argumentTypes.map((ref) =>
    resolveInContext(runtime, ref, declaringType, context)
  ),
});
