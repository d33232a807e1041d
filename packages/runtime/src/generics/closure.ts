/**
 * Generic closure
 *
 * Closing an open type over concrete arguments produces a new descriptor
 * whose member tables delegate to the open type's. Results are cached per
 * open type under the hash of the argument identities, so closing twice over
 * identity-equal arguments returns the same descriptor.
 */

import { fail } from "../host/reporting.js";
import { closedTypeId } from "../identity/type-ids.js";
import { createTypeDescriptor } from "../model/descriptors.js";
import { isDelegateValue } from "../model/guards.js";
import {
  bindFunction,
  functionEntry,
  lookupEntry,
  lookupFunction,
  NULL_ENTRY,
  setEntry,
} from "../model/member-table.js";
import { signatureKey } from "../model/method-signature.js";
import {
  describeTypeReference,
  requireTypeArguments,
  typeReferenceId,
} from "../model/type-refs.js";
import type {
  PublicInterface,
  TypeArgument,
  TypeDescriptor,
  TypeReference,
  TypeRuntime,
} from "../model/types.js";
import { qualifiedKey } from "../naming/names.js";
import { initializeType } from "../initialization/initialize-type.js";
import {
  resolveGenericArgument,
  resolveGenericMethodSignature,
  resolveGenericReference,
  resolveTypeReference,
} from "./resolve.js";

const isOpenArgument = (arg: TypeArgument): boolean =>
  arg.kind !== "type" || !arg.isClosed;

const argumentName = (arg: TypeArgument): string =>
  arg.kind === "type" ? arg.fullName : describeTypeReference(arg);

/**
 * Record, on the closed type, the resolved value of every generic parameter
 * still unresolved anywhere along the open type's base chain. A derived type
 * may fix an ancestor's parameter.
 */
const findGenericParameters = (
  runtime: TypeRuntime,
  closed: TypeDescriptor,
  open: TypeDescriptor
): void => {
  for (
    let current: TypeDescriptor | null = open.baseType;
    current !== null;
    current = current.baseType
  ) {
    for (const [key, value] of current.genericBindings) {
      if (closed.genericBindings.has(key) || !isOpenArgument(value)) continue;
      const resolved = resolveGenericArgument(runtime, value, closed);
      if (resolved !== value) {
        closed.genericBindings.set(key, resolved);
      }
    }
  }
};

/**
 * Re-key methods whose signature mentions a generic parameter, so lookups by
 * the substituted signature find them.
 */
export const renameGenericMethods = (
  runtime: TypeRuntime,
  closed: TypeDescriptor
): void => {
  const publicInterface = closed.publicInterface;

  for (const member of closed.members) {
    if (member.kind !== "method" && member.kind !== "constructor") continue;

    const table = member.descriptor.isStatic
      ? publicInterface.staticTable
      : publicInterface.instanceTemplate;
    if (!table) continue;

    const oldKey = member.data.mangledName;
    if (closed.renamedMethods.has(oldKey)) continue;

    const resolved = resolveGenericMethodSignature(
      runtime,
      member.data.signature,
      closed
    );
    if (!resolved) continue;

    const newKey = signatureKey(runtime, resolved, member.descriptor.escapedName);
    if (newKey === oldKey) continue;

    const entry = lookupEntry(table, oldKey);
    if (!entry) continue;

    closed.renamedMethods.set(oldKey, newKey);
    setEntry(table, oldKey, NULL_ENTRY);
    setEntry(table, newKey, entry);
  }
};

/**
 * Give static raw methods a fixed receiver: the type's own public interface.
 */
export const rebindRawMethods = (type: TypeDescriptor): void => {
  const publicInterface = type.publicInterface;

  for (const raw of type.rawMethods) {
    if (!raw.isStatic) continue;
    const fn = lookupFunction(publicInterface.staticTable, raw.name);
    if (fn) {
      setEntry(
        publicInterface.staticTable,
        raw.name,
        functionEntry(bindFunction(fn, publicInterface))
      );
    }
  }

  if (type.typeKind === "delegate") {
    type.customCheck = (value) =>
      isDelegateValue(value) && value.type.typeId === type.typeId;
  }
};

const dedupeReferences = (
  runtime: TypeRuntime,
  refs: readonly TypeReference[],
  type: TypeDescriptor
): TypeReference[] => {
  const seen = new Set<string>();
  const result: TypeReference[] = [];
  for (const ref of refs) {
    const id = typeReferenceId(runtime, ref, type.loadUnit);
    if (seen.has(id)) continue;
    seen.add(id);
    result.push(ref);
  }
  return result;
};

const createClosedDescriptor = (
  runtime: TypeRuntime,
  open: TypeDescriptor,
  args: readonly TypeArgument[]
): TypeDescriptor => {
  const openInterface = open.publicInterface;
  const closed = createTypeDescriptor({
    typeKind: open.typeKind,
    loadUnit: open.loadUnit,
    fullName: `${open.fullName}[${args.map(argumentName).join(", ")}]`,
    typeId: closedTypeId(
      open.typeId,
      args.map((arg) => arg.typeId)
    ),
    isReferenceType: open.isReferenceType,
    isStruct: open.isStruct,
    baseType: open.baseType,
    interfaces: [],
    genericParameterNames: open.genericParameterNames,
    openType: open,
    renamedMethods: open.renamedMethods,
    members: open.members,
    properties: open.properties,
    rawMethods: open.rawMethods,
    interfaceMembers: open.interfaceMembers,
    fieldsToInitialize: open.fieldsToInitialize,
    initializers: open.initializers,
    staticParent: openInterface.staticTable,
    templateParent: openInterface.instanceTemplate ?? undefined,
  });

  closed.fullNameWithoutArguments = open.fullName;
  closed.inheritanceDepth = open.inheritanceDepth;
  closed.isNumeric = open.isNumeric;
  closed.isIntegral = open.isIntegral;
  closed.isNativeType = open.isNativeType;
  closed.customCheck = open.customCheck;
  closed.runtimeType = open.runtimeType;
  closed.elementType = open.elementType;
  closed.genericArgumentValues = args;
  return closed;
};

/**
 * Close an open generic type. With `initialize`, the result is initialized
 * when the open type already is.
 */
export const closeType = (
  runtime: TypeRuntime,
  open: TypeDescriptor,
  args: readonly (TypeReference | null | undefined)[],
  initialize = true
): TypeDescriptor => {
  const expected = open.genericParameterNames.length;
  if (args.length !== expected) {
    throw fail(
      runtime,
      "TFG2003",
      `Invalid number of generic arguments for type '${open.fullName}' (got ${args.length}, expected ${expected}).`,
      { subject: open.fullName }
    );
  }

  const resolved = requireTypeArguments(runtime, args, open.fullName).map((arg) =>
    resolveTypeReference(runtime, arg, open.loadUnit)
  );
  const cacheKey = resolved.map((arg) => arg.typeId).join(",");

  const cached = open.closedTypes.get(cacheKey);
  if (cached) {
    if (initialize && open.initialized) initializeType(runtime, cached);
    return cached;
  }

  const closed = createClosedDescriptor(runtime, open, resolved);
  open.closedTypes.set(cacheKey, closed);

  open.genericParameterNames.forEach((name, i) => {
    const value = resolved[i];
    if (value !== undefined) {
      closed.genericBindings.set(qualifiedKey(open.fullName, name), value);
    }
  });
  findGenericParameters(runtime, closed, open);

  // Recursion through the base type or interfaces must not initialize the
  // half-built closed type.
  closed.initialized = true;

  if (open.baseType) {
    const base = resolveGenericArgument(runtime, open.baseType, closed);
    if (base.kind === "type") {
      closed.baseType = base;
    }
  }
  closed.interfaces = dedupeReferences(
    runtime,
    open.interfaces.map((ref) => resolveGenericReference(runtime, ref, closed)),
    closed
  );

  closed.isClosed = !resolved.some(isOpenArgument);
  if (closed.isClosed) {
    renameGenericMethods(runtime, closed);
    rebindRawMethods(closed);
  }

  closed.initialized = false;

  if (initialize && open.initialized) initializeType(runtime, closed);
  return closed;
};

/** Close through public interfaces, as generated code does. */
export const closeGeneric = (
  runtime: TypeRuntime,
  open: PublicInterface,
  ...args: (TypeReference | null | undefined)[]
): PublicInterface => closeType(runtime, open.descriptor, args, true).publicInterface;

export const closeGenericNoInitialize = (
  runtime: TypeRuntime,
  open: PublicInterface,
  ...args: (TypeReference | null | undefined)[]
): PublicInterface => closeType(runtime, open.descriptor, args, false).publicInterface;
