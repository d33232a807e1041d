/**
 * Type builder - the member declaration surface handed to initializers
 *
 * Declarations record member metadata on the descriptor (for reflection,
 * dispatch and conformance) and install bodies under their mangled keys
 * (`Name` + signature hash) in the static table or instance template.
 */

import { createExternalStub, externalKey, findExternal } from "../externals/externals.js";
import { resolveInContext } from "../generics/resolve.js";
import { fail, warn } from "../host/reporting.js";
import { requireCoreLoadUnit } from "../identity/load-units.js";
import { defaultValue } from "../instances/default-values.js";
import {
  createFunction,
  functionEntry,
  functionFromImpl,
  lookupFunction,
  setEntry,
  valueEntry,
} from "../model/member-table.js";
import {
  createSignature,
  getCachedSignature,
  signatureKey,
  signatureToString,
} from "../model/method-signature.js";
import { createGenericParameter, createTypeRef } from "../model/type-refs.js";
import type {
  GenericParameter,
  LoadUnit,
  MemberDescriptor,
  MemberRecord,
  MemberTable,
  MethodImpl,
  MethodSignature,
  PublicInterface,
  TypeDescriptor,
  TypeReference,
  TypeRef,
  TypeRuntime,
} from "../model/types.js";
import { escapeName, isSpecialName } from "../naming/names.js";

export type MemberFlags = {
  readonly isStatic?: boolean;
  readonly isPublic?: boolean;
};

export type TypeBuilder = {
  readonly runtime: TypeRuntime;
  readonly type: TypeDescriptor;
  readonly publicInterface: PublicInterface;
  readonly loadUnit: LoadUnit;
  readonly field: (
    flags: MemberFlags,
    name: string,
    fieldType: TypeReference,
    defaultValue?: () => unknown
  ) => void;
  /** Interface methods take no body. */
  readonly method: (
    flags: MemberFlags,
    name: string,
    signature: MethodSignature,
    impl?: MethodImpl
  ) => void;
  readonly externalMethod: (
    flags: MemberFlags,
    name: string,
    signature: MethodSignature
  ) => void;
  /** A plain function outside overload dispatch. */
  readonly rawMethod: (isStatic: boolean, name: string, impl: MethodImpl) => void;
  readonly property: (flags: MemberFlags, name: string) => void;
  readonly genericProperty: (flags: MemberFlags, name: string) => void;
  readonly constant: (flags: MemberFlags, name: string, value: unknown) => void;
  readonly externalMembers: (isInstance: boolean, ...names: string[]) => void;
  readonly inheritBaseMethod: (name: string) => void;
  readonly inheritDefaultConstructor: () => void;
  readonly implementInterfaces: (...interfaces: TypeReference[]) => void;
  readonly setValue: (key: string, value: unknown) => void;
  readonly genericParameter: (name: string) => GenericParameter;
  readonly typeRef: (
    name: string,
    genericArguments?: readonly TypeReference[]
  ) => TypeRef;
  readonly signature: (
    returnType: TypeReference | null,
    argumentTypes?: readonly TypeReference[],
    genericArgumentNames?: readonly string[]
  ) => MethodSignature;
  readonly corlibRef: (name: string) => TypeRef;
};

const CONSTRUCTOR_NAMES: ReadonlySet<string> = new Set([".ctor", "_ctor"]);

const parseDescriptor = (flags: MemberFlags, name: string): MemberDescriptor => ({
  name,
  escapedName: escapeName(name),
  isStatic: flags.isStatic ?? false,
  isPublic: flags.isPublic ?? false,
  isSpecialName: isSpecialName(name),
});

/**
 * Append a member record. A method record supplied by an external
 * implementation under the same key is replaced by the declared one.
 */
const pushMember = (type: TypeDescriptor, record: MemberRecord): void => {
  if (record.kind === "method" || record.kind === "constructor") {
    const { isStatic } = record.descriptor;
    const { mangledName } = record.data;
    const existing = type.members.findIndex(
      (member) =>
        (member.kind === "method" || member.kind === "constructor") &&
        member.descriptor.isStatic === isStatic &&
        member.data.mangledName === mangledName
    );
    if (existing >= 0) {
      type.members[existing] = record;
      return;
    }
  }
  type.members.push(record);
};

/**
 * Default of an instance field as stored on the template. Structs get a
 * fresh value per instance at construction, so the template holds null.
 */
const templateDefault = (
  runtime: TypeRuntime,
  declaringType: TypeDescriptor,
  target: TypeDescriptor,
  fieldType: TypeReference
): unknown => {
  const resolved = resolveInContext(runtime, fieldType, declaringType, target);
  if (resolved.kind !== "type") return null;
  if (resolved.isStruct && !resolved.isNativeType && resolved.typeKind !== "enum") {
    return null;
  }
  return defaultValue(runtime, resolved);
};

/** Static struct fields hold one value of their own. */
const staticDefault = (
  runtime: TypeRuntime,
  declaringType: TypeDescriptor,
  target: TypeDescriptor,
  fieldType: TypeReference
): unknown => {
  const resolved = resolveInContext(runtime, fieldType, declaringType, target);
  return resolved.kind === "type" ? defaultValue(runtime, resolved) : null;
};

export const createTypeBuilder = (
  runtime: TypeRuntime,
  type: TypeDescriptor
): TypeBuilder => {
  const publicInterface = type.publicInterface;
  const loadUnit = type.loadUnit;
  const isInterface = type.typeKind === "interface";

  const targetTable = (descriptor: MemberDescriptor): MemberTable => {
    if (descriptor.isStatic) return publicInterface.staticTable;
    if (publicInterface.instanceTemplate) return publicInterface.instanceTemplate;
    throw fail(
      runtime,
      "TFG1003",
      `Type '${type.fullName}' has no instances; the instance member '${descriptor.name}' cannot be declared.`,
      { subject: type.fullName }
    );
  };

  const methodKind = (descriptor: MemberDescriptor) =>
    CONSTRUCTOR_NAMES.has(descriptor.name) ? "constructor" : "method";

  const declareInterfaceMethod = (descriptor: MemberDescriptor, mangledName: string) => {
    type.interfaceMembers.set(descriptor.escapedName, "method");
    type.interfaceMembers.set(mangledName, "method");
  };

  const builder: TypeBuilder = {
    runtime,
    type,
    publicInterface,
    loadUnit,

    field: (flags, name, fieldType, defaultThunk) => {
      const descriptor = parseDescriptor(flags, name);
      pushMember(type, { kind: "field", descriptor, data: { fieldType } });

      type.fieldsToInitialize.push((target) => {
        const targetInterface = target.publicInterface;
        if (descriptor.isStatic) {
          targetInterface.fields.set(
            descriptor.escapedName,
            defaultThunk ? defaultThunk() : staticDefault(runtime, type, target, fieldType)
          );
          return;
        }
        const template = targetInterface.instanceTemplate;
        if (!template) return;
        setEntry(template, descriptor.escapedName, {
          kind: "lazy",
          compute: () =>
            valueEntry(
              defaultThunk
                ? defaultThunk()
                : templateDefault(runtime, type, target, fieldType)
            ),
        });
      });
    },

    method: (flags, name, signature, impl) => {
      const descriptor = parseDescriptor(flags, name);
      const mangledName = signatureKey(runtime, signature, descriptor.escapedName);
      if (isInterface) {
        declareInterfaceMethod(descriptor, mangledName);
        return;
      }
      if (!impl) {
        throw fail(
          runtime,
          "TFG1003",
          `Method '${name}' of type '${type.fullName}' needs an implementation.`,
          { subject: type.fullName }
        );
      }

      setEntry(
        targetTable(descriptor),
        mangledName,
        functionEntry(
          functionFromImpl(signatureToString(signature, `${type.fullName}.${name}`), impl)
        )
      );
      pushMember(type, {
        kind: methodKind(descriptor),
        descriptor,
        data: { signature, mangledName, isExternal: false, isPlaceholder: false },
      });
    },

    externalMethod: (flags, name, signature) => {
      const descriptor = parseDescriptor(flags, name);
      const mangledName = signatureKey(runtime, signature, descriptor.escapedName);
      if (isInterface) {
        declareInterfaceMethod(descriptor, mangledName);
        return;
      }

      const table = targetTable(descriptor);
      const external = findExternal(
        runtime,
        type.fullName,
        externalKey(descriptor.isStatic, mangledName)
      );

      let isPlaceholder = false;
      if (external) {
        setEntry(table, mangledName, external.entry);
      } else if (!table.entries.has(mangledName)) {
        setEntry(
          table,
          mangledName,
          functionEntry(
            createExternalStub(runtime, type.fullName, table, mangledName, () =>
              signatureToString(signature, name)
            )
          )
        );
        isPlaceholder = true;
      }

      pushMember(type, {
        kind: methodKind(descriptor),
        descriptor,
        data: { signature, mangledName, isExternal: true, isPlaceholder },
      });
    },

    rawMethod: (isStatic, name, impl) => {
      const key = escapeName(name);
      const table = isStatic
        ? publicInterface.staticTable
        : targetTable(parseDescriptor({ isStatic }, name));
      setEntry(table, key, functionEntry(functionFromImpl(`${type.fullName}.${name}`, impl)));
      type.rawMethods.push({ isStatic, name: key });
    },

    property: (flags, name) => {
      if (isInterface) {
        type.interfaceMembers.set(escapeName(name), "property");
        return;
      }
      builder.genericProperty(flags, name);
    },

    genericProperty: (flags, name) => {
      const descriptor = parseDescriptor(flags, name);
      type.properties.push({ isStatic: descriptor.isStatic, name });
      pushMember(type, { kind: "property", descriptor, data: null });
    },

    constant: (flags, name, value) => {
      const descriptor = parseDescriptor(flags, name);
      setEntry(targetTable(descriptor), descriptor.escapedName, valueEntry(value));
    },

    externalMembers: (isInstance, ...names) => {
      const table = isInstance
        ? targetTable(parseDescriptor({ isStatic: false }, names.join(", ")))
        : publicInterface.staticTable;

      for (const name of names) {
        const external = findExternal(runtime, type.fullName, externalKey(!isInstance, name));
        if (external) {
          setEntry(table, name, external.entry);
        } else if (!table.entries.has(name)) {
          setEntry(
            table,
            name,
            functionEntry(createExternalStub(runtime, type.fullName, table, name, () => name))
          );
        }
      }
    },

    inheritBaseMethod: (name) => {
      const signature = createSignature(loadUnit, null, []);
      const descriptor = parseDescriptor({ isPublic: true, isStatic: false }, name);
      const mangledName = signatureKey(runtime, signature, descriptor.escapedName);
      const table = targetTable(descriptor);

      setEntry(
        table,
        mangledName,
        functionEntry(
          createFunction(`<Inherited ${type.fullName}.${name}>`, (self, args) => {
            const inherited = table.parent ? lookupFunction(table.parent, mangledName) : undefined;
            if (inherited) return inherited.invoke(self, args);
            warn(
              runtime,
              "TFG3006",
              `'${type.fullName}.${name}' inherits its base method, but no base type declares one.`,
              type.fullName
            );
            return undefined;
          })
        )
      );
      pushMember(type, {
        kind: methodKind(descriptor),
        descriptor,
        data: { signature, mangledName, isExternal: false, isPlaceholder: false },
      });
    },

    inheritDefaultConstructor: () => builder.inheritBaseMethod(".ctor"),

    implementInterfaces: (...interfaces) => {
      type.interfaces.push(...interfaces);
    },

    setValue: (key, value) => {
      publicInterface.fields.set(key, value);
      setEntry(publicInterface.staticTable, key, valueEntry(value));
      if (publicInterface.instanceTemplate) {
        setEntry(publicInterface.instanceTemplate, key, valueEntry(value));
      }
    },

    genericParameter: (name) => createGenericParameter(runtime, type.fullName, name),

    typeRef: (name, genericArguments = []) =>
      createTypeRef(runtime, loadUnit, name, genericArguments),

    signature: (returnType, argumentTypes = [], genericArgumentNames = []) =>
      getCachedSignature(runtime, loadUnit, returnType, argumentTypes, genericArgumentNames),

    corlibRef: (name) => createTypeRef(runtime, requireCoreLoadUnit(runtime), name),
  };

  return builder;
};
