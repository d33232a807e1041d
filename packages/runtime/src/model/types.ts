/**
 * Core data model of the type runtime
 *
 * Everything here is plain data: descriptors, member tables, references and
 * the runtime state container. Behaviour lives in the functional modules that
 * take a `TypeRuntime` as their first argument.
 */

import type { ResolvedRuntimeOptions } from "../config/options.js";
import type { Diagnostic } from "../types/diagnostic.js";

// ═══════════════════════════════════════════════════════════════════════════
// CALLABLES AND MEMBER TABLES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Anything members can be read from or invoked on: an instance or a type's
 * public interface.
 */
export type MemberHost = RuntimeObject | PublicInterface;

/** Body of a declared method; `self` is the instance or public interface. */
export type MethodImpl = (self: MemberHost, ...args: unknown[]) => unknown;

export type RuntimeFunction = {
  readonly kind: "function";
  readonly displayName: string;
  /** Stand-in for an external member nobody has implemented. */
  readonly isPlaceholder: boolean;
  readonly invoke: (self: MemberHost, args: readonly unknown[]) => unknown;
};

export type TableEntry =
  | { readonly kind: "value"; readonly value: unknown }
  | { readonly kind: "function"; readonly fn: RuntimeFunction }
  | {
      readonly kind: "accessor";
      readonly get: RuntimeFunction | null;
      readonly set: RuntimeFunction | null;
    }
  /** Forwards reads to another key of a member table. */
  | { readonly kind: "alias"; readonly table: MemberTable; readonly key: string }
  /** Computed on first read, then replaced by its result. */
  | { readonly kind: "lazy"; readonly compute: () => TableEntry };

/**
 * Explicit stand-in for a prototype: own entries plus a parent table that
 * lookups fall through to.
 */
export type MemberTable = {
  readonly owner: string;
  readonly entries: Map<string, TableEntry>;
  readonly parent: MemberTable | null;
};

// ═══════════════════════════════════════════════════════════════════════════
// TYPE REFERENCES
// ═══════════════════════════════════════════════════════════════════════════

/** Generic parameter bound by name to the type or method declaring it. */
export type GenericParameter = {
  readonly kind: "genericParameter";
  readonly name: string;
  readonly owner: string;
  /** `escaped(owner)$escaped(name)`, the binding key in generic contexts. */
  readonly key: string;
  readonly typeId: string;
};

/** Method-level generic parameter `!!n`, bound only at call time. */
export type PositionalGenericParameter = {
  readonly kind: "positionalParameter";
  readonly index: number;
  readonly typeId: string;
};

/** Lazily resolved reference to a (possibly generic) named type. */
export type TypeRef = {
  readonly kind: "typeRef";
  readonly context: LoadUnit;
  readonly typeName: string;
  readonly genericArguments: readonly TypeReference[];
  cached: PublicInterface | null;
};

export type TypeReference =
  | string
  | TypeRef
  | GenericParameter
  | PositionalGenericParameter
  | TypeDescriptor
  | PublicInterface;

/** What a type reference resolves to. */
export type TypeArgument =
  | TypeDescriptor
  | GenericParameter
  | PositionalGenericParameter;

// ═══════════════════════════════════════════════════════════════════════════
// SIGNATURES AND MEMBERS
// ═══════════════════════════════════════════════════════════════════════════

export type MethodSignature = {
  readonly kind: "signature";
  readonly context: LoadUnit;
  /** null is void. */
  readonly returnType: TypeReference | null;
  readonly argumentTypes: readonly TypeReference[];
  readonly genericArgumentNames: readonly string[];
  hash: string | null;
};

export type MemberDescriptor = {
  readonly name: string;
  readonly escapedName: string;
  readonly isStatic: boolean;
  readonly isPublic: boolean;
  readonly isSpecialName: boolean;
};

export type MethodData = {
  readonly signature: MethodSignature;
  readonly mangledName: string;
  readonly isExternal: boolean;
  readonly isPlaceholder: boolean;
};

export type FieldData = {
  readonly fieldType: TypeReference;
};

export type MemberRecord =
  | {
      readonly kind: "field";
      readonly descriptor: MemberDescriptor;
      readonly data: FieldData;
    }
  | {
      readonly kind: "method";
      readonly descriptor: MemberDescriptor;
      readonly data: MethodData;
    }
  | {
      readonly kind: "constructor";
      readonly descriptor: MemberDescriptor;
      readonly data: MethodData;
    }
  | {
      readonly kind: "property";
      readonly descriptor: MemberDescriptor;
      readonly data: null;
    };

export type MethodRecord = Extract<
  MemberRecord,
  { readonly kind: "method" } | { readonly kind: "constructor" }
>;

export type PropertyRecord = {
  readonly isStatic: boolean;
  readonly name: string;
};

export type RawMethodRecord = {
  readonly isStatic: boolean;
  readonly name: string;
};

export type InterfaceMemberKind = "method" | "property";

// ═══════════════════════════════════════════════════════════════════════════
// TYPE DESCRIPTORS
// ═══════════════════════════════════════════════════════════════════════════

export type TypeKind =
  | "class"
  | "struct"
  | "interface"
  | "static"
  | "enum"
  | "delegate"
  | "array"
  | "any";

export type EnumInfo = {
  readonly isFlags: boolean;
  readonly names: readonly string[];
  readonly values: Map<string, number>;
  readonly valueToName: Map<number, string>;
};

export type TypeDescriptor = {
  readonly kind: "type";
  readonly typeKind: TypeKind;
  readonly loadUnit: LoadUnit;
  readonly shortName: string;
  fullName: string;
  fullNameWithoutArguments: string;
  typeId: string;
  readonly isReferenceType: boolean;
  readonly isStruct: boolean;
  isNumeric: boolean;
  isIntegral: boolean;
  /** Values are host primitives (numbers, strings, booleans), never instances. */
  isNativeType: boolean;
  baseType: TypeDescriptor | null;
  inheritanceDepth: number;
  /** Resolved in place during interface fixup. */
  interfaces: TypeReference[];
  /** Members an interface type declares, by key. */
  readonly interfaceMembers: Map<string, InterfaceMemberKind>;
  readonly genericParameterNames: readonly string[];
  members: MemberRecord[];
  readonly properties: PropertyRecord[];
  readonly fieldsToInitialize: ((type: TypeDescriptor) => void)[];
  readonly rawMethods: RawMethodRecord[];
  /** Original method key to post-substitution key, for closed generics. */
  readonly renamedMethods: Map<string, string>;
  readonly initializers: ((type: TypeDescriptor) => void)[];
  initialized: boolean;
  isClosed: boolean;
  readonly openType: TypeDescriptor | null;
  genericArgumentValues: readonly TypeArgument[];
  /** Generic parameter key to bound argument. */
  readonly genericBindings: Map<string, TypeArgument>;
  /** Closed-type cache, keyed by the hash of the argument identities. */
  readonly closedTypes: Map<string, TypeDescriptor>;
  assignableTypes: Set<string> | null;
  reflectionCache: readonly MemberInfo[] | null;
  structFields: readonly StructField[] | null;
  customCheck: ((value: unknown) => boolean) | null;
  runtimeType: TypeDescriptor | null;
  enumInfo: EnumInfo | null;
  elementType: TypeDescriptor | null;
  readonly publicInterface: PublicInterface;
};

/** The static-facing surface of a type; exactly one per descriptor. */
export type PublicInterface = {
  readonly kind: "publicInterface";
  readonly descriptor: TypeDescriptor;
  readonly staticTable: MemberTable;
  /** null for static classes, which have no instances. */
  readonly instanceTemplate: MemberTable | null;
  readonly fields: Map<string, unknown>;
};

export type StructField = {
  readonly name: string;
  readonly fieldType: TypeDescriptor;
};

// ═══════════════════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════════════════

export type RuntimeObject = {
  readonly kind: "instance";
  readonly type: TypeDescriptor;
  readonly template: MemberTable;
  readonly fields: Map<string, unknown>;
};

export type EnumValue = {
  readonly kind: "enumValue";
  readonly type: TypeDescriptor;
  readonly value: number;
  readonly name: string | null;
};

export type DelegateValue = {
  readonly kind: "delegate";
  readonly type: TypeDescriptor;
  readonly target: MemberHost | null;
  readonly method: RuntimeFunction;
};

// ═══════════════════════════════════════════════════════════════════════════
// REFLECTION
// ═══════════════════════════════════════════════════════════════════════════

export type MemberInfoType =
  | "FieldInfo"
  | "MethodInfo"
  | "ConstructorInfo"
  | "PropertyInfo";

export type MemberInfo = {
  readonly kind: "memberInfo";
  readonly memberType: MemberInfoType;
  readonly name: string;
  readonly declaringType: TypeDescriptor;
  readonly record: MemberRecord;
  readonly isStatic: boolean;
  readonly isPublic: boolean;
  readonly isSpecialName: boolean;
};

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRY
// ═══════════════════════════════════════════════════════════════════════════

export type TypeGetter = (unseal?: boolean) => PublicInterface;

export type BindingSlot =
  | { readonly state: "unconstructed" }
  | { readonly state: "constructing" }
  | { readonly state: "constructed"; readonly value: PublicInterface }
  | { readonly state: "initialized"; readonly value: PublicInterface }
  | { readonly state: "failed"; readonly error: unknown };

export type Binding = {
  readonly name: string;
  readonly loadUnit: LoadUnit;
  readonly isPublic: boolean;
  readonly creator: () => PublicInterface;
  readonly initializer: ((value: PublicInterface) => void) | null;
  sealed: boolean;
  slot: BindingSlot;
  readonly getter: TypeGetter;
};

export type NamespaceEntry =
  | { readonly kind: "namespace"; readonly node: NamespaceNode }
  | { readonly kind: "binding"; readonly binding: Binding }
  | { readonly kind: "ambiguous"; readonly name: string }
  | { readonly kind: "external"; readonly external: ExternalTypeSlot };

export type NamespaceNode = {
  readonly fullName: string;
  readonly entries: Map<string, NamespaceEntry>;
  /** Lookups that allow inheritance continue here when a key is missing. */
  readonly fallback: NamespaceNode | null;
  sealed: boolean;
};

export type ExternalTypeSlot = {
  readonly name: string;
  value: PublicInterface | null;
};

export type LoadUnit = {
  readonly kind: "loadUnit";
  readonly name: string;
  readonly shortName: string;
  readonly id: number;
  readonly namespace: NamespaceNode;
  readonly typesByName: Map<string, TypeGetter>;
};

// ═══════════════════════════════════════════════════════════════════════════
// EXTERNALS
// ═══════════════════════════════════════════════════════════════════════════

export type ExternalEntry = {
  readonly member: MemberRecord | null;
  readonly entry: TableEntry;
};

export type ExternalTable = {
  readonly entries: Map<string, ExternalEntry>;
  initialized: boolean;
};

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME STATE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Process-wide state of one runtime: registry, identity tables, externals
 * and diagnostics. Tests create as many as they like.
 */
export type TypeRuntime = {
  readonly options: ResolvedRuntimeOptions;
  readonly diagnostics: Diagnostic[];
  readonly globalNamespace: NamespaceNode;
  readonly loadUnits: Map<string, LoadUnit>;
  /** Short name to full name; null once two full names share it. */
  readonly loadUnitShortNames: Map<string, string | null>;
  nextLoadUnitId: number;
  coreLoadUnit: LoadUnit | null;
  readonly publicTypes: Map<string, TypeGetter>;
  readonly publicTypeLoadUnits: Map<string, LoadUnit>;
  readonly assignedTypeIds: Map<string, string>;
  readonly genericParameterIds: Map<string, string>;
  nextTypeId: number;
  readonly bindings: Binding[];
  /** Set once every registration made so far has been sealed. */
  sealed: boolean;
  readonly externalQueues: Map<string, (() => void)[]>;
  readonly externalTables: Map<string, ExternalTable>;
  readonly warnedPlaceholders: Set<string>;
  readonly signatureCache: Map<string, MethodSignature>;
  readonly arrayTypes: Map<string, TypeDescriptor>;
  rootInitialized: boolean;
  stubRuntimeType: TypeDescriptor | null;
  anyType: TypeDescriptor | null;
};
