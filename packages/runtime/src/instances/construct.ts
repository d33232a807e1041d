/**
 * Instance construction
 */

import { resolveInContext } from "../generics/resolve.js";
import { fail, warn } from "../host/reporting.js";
import { initializeType } from "../initialization/initialize-type.js";
import { isRuntimeObject } from "../model/guards.js";
import { lookupFunction } from "../model/member-table.js";
import type {
  MemberTable,
  RuntimeObject,
  StructField,
  TypeDescriptor,
  TypeRuntime,
} from "../model/types.js";
import { escapeName } from "../naming/names.js";

/** Struct types whose values are instances rather than host primitives. */
export const isInstanceStruct = (type: TypeDescriptor): boolean =>
  type.isStruct && !type.isNativeType && type.typeKind !== "enum";

const requireConstructible = (
  runtime: TypeRuntime,
  type: TypeDescriptor
): MemberTable => {
  const template = type.publicInterface.instanceTemplate;
  if (type.isClosed && type.typeKind !== "interface" && template !== null) {
    return template;
  }

  const reason = !type.isClosed
    ? "it is an open generic type"
    : type.typeKind === "interface"
      ? "it is an interface"
      : "it has no instances";
  throw fail(
    runtime,
    "TFG2005",
    `Cannot create an instance of '${type.fullName}' because ${reason}.`,
    { subject: type.fullName }
  );
};

/**
 * Instance fields of struct type, along the whole base chain. Computed once
 * per type.
 */
const structFieldsOf = (
  runtime: TypeRuntime,
  type: TypeDescriptor
): readonly StructField[] => {
  if (type.structFields) return type.structFields;

  const fields: StructField[] = [];
  for (
    let owner: TypeDescriptor | null = type;
    owner !== null;
    owner = owner.baseType
  ) {
    for (const member of owner.members) {
      if (member.kind !== "field" || member.descriptor.isStatic) continue;
      const fieldType = resolveInContext(runtime, member.data.fieldType, owner, type);
      if (fieldType.kind === "type" && isInstanceStruct(fieldType)) {
        fields.push({ name: member.descriptor.escapedName, fieldType });
      }
    }
  }

  type.structFields = fields;
  return fields;
};

const initializeStructFields = (runtime: TypeRuntime, instance: RuntimeObject): void => {
  for (const field of structFieldsOf(runtime, instance.type)) {
    if (field.fieldType === instance.type) continue;
    instance.fields.set(field.name, allocate(runtime, field.fieldType));
  }
};

/** An instance with default field values and no constructor run. */
const allocate = (runtime: TypeRuntime, type: TypeDescriptor): RuntimeObject => {
  initializeType(runtime, type);
  const template = requireConstructible(runtime, type);
  const instance: RuntimeObject = { kind: "instance", type, template, fields: new Map() };
  initializeStructFields(runtime, instance);
  return instance;
};

/**
 * Create an instance and run the constructor group `constructorName` over
 * `args`. A struct built with no arguments gets its default value and no
 * constructor call.
 */
export const construct = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  args: readonly unknown[] = [],
  constructorName = ".ctor"
): RuntimeObject => {
  const instance = allocate(runtime, type);
  if (type.isStruct && args.length === 0) return instance;

  const ctor = lookupFunction(instance.template, escapeName(constructorName));
  if (!ctor) {
    if (args.length === 0) return instance;
    throw fail(
      runtime,
      "TFG2007",
      `Type '${type.fullName}' has no constructor taking ${args.length} argument(s).`,
      { subject: type.fullName }
    );
  }
  if (ctor.isPlaceholder) {
    warn(
      runtime,
      "TFG3008",
      `Constructing '${type.fullName}' with a constructor that has not been implemented.`,
      type.fullName
    );
  }

  ctor.invoke(instance, args);
  return instance;
};

/**
 * Construct by type, the way reflection does. With `null` arguments no
 * constructor runs at all.
 */
export const createInstanceOfType = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  constructorArguments: readonly unknown[] | null,
  constructorName?: string
): RuntimeObject =>
  constructorArguments === null
    ? allocate(runtime, type)
    : construct(runtime, type, constructorArguments, constructorName);

/** Shallow copy; struct-valued fields are copied too, as values are. */
export const memberwiseClone = (instance: RuntimeObject): RuntimeObject => {
  const fields = new Map<string, unknown>();
  for (const [key, value] of instance.fields) {
    fields.set(
      key,
      isRuntimeObject(value) && isInstanceStruct(value.type) ? memberwiseClone(value) : value
    );
  }
  return { kind: "instance", type: instance.type, template: instance.template, fields };
};
