/**
 * Type descriptor construction
 */

import { getLocalName } from "../naming/names.js";
import { createMemberTable } from "./member-table.js";
import type {
  InterfaceMemberKind,
  LoadUnit,
  MemberRecord,
  MemberTable,
  PropertyRecord,
  PublicInterface,
  RawMethodRecord,
  TypeDescriptor,
  TypeKind,
  TypeReference,
} from "./types.js";

export type DescriptorInit = {
  readonly typeKind: TypeKind;
  readonly loadUnit: LoadUnit;
  readonly fullName: string;
  readonly typeId: string;
  readonly isReferenceType: boolean;
  readonly isStruct?: boolean;
  readonly baseType?: TypeDescriptor | null;
  readonly interfaces?: readonly TypeReference[];
  readonly genericParameterNames?: readonly string[];
  readonly openType?: TypeDescriptor | null;
  readonly renamedMethods?: ReadonlyMap<string, string>;
  readonly members?: readonly MemberRecord[];
  readonly properties?: readonly PropertyRecord[];
  readonly rawMethods?: readonly RawMethodRecord[];
  readonly interfaceMembers?: ReadonlyMap<string, InterfaceMemberKind>;
  readonly fieldsToInitialize?: readonly ((type: TypeDescriptor) => void)[];
  readonly initializers?: readonly ((type: TypeDescriptor) => void)[];
  /** Parent of the static member table. */
  readonly staticParent?: MemberTable | null;
  /** Parent of the instance template; undefined means no template at all. */
  readonly templateParent?: MemberTable | null;
};

/**
 * Create a descriptor together with its public interface. The two refer to
 * each other and are never created apart.
 */
export const createTypeDescriptor = (init: DescriptorInit): TypeDescriptor => {
  const baseType = init.baseType ?? null;
  const genericParameterNames = init.genericParameterNames ?? [];
  const openType = init.openType ?? null;

  const staticTable = createMemberTable(init.fullName, init.staticParent ?? null);
  const instanceTemplate =
    init.templateParent === undefined
      ? null
      : createMemberTable(init.fullName, init.templateParent);

  const descriptor: TypeDescriptor = {
    kind: "type",
    typeKind: init.typeKind,
    loadUnit: init.loadUnit,
    shortName: getLocalName(init.fullName),
    fullName: init.fullName,
    fullNameWithoutArguments: init.fullName,
    typeId: init.typeId,
    isReferenceType: init.isReferenceType,
    isStruct: init.isStruct ?? false,
    isNumeric: false,
    isIntegral: false,
    isNativeType: false,
    baseType,
    inheritanceDepth: baseType ? baseType.inheritanceDepth + 1 : 0,
    interfaces: [...(init.interfaces ?? [])],
    interfaceMembers: new Map(init.interfaceMembers ?? []),
    genericParameterNames,
    members: [...(init.members ?? [])],
    properties: [...(init.properties ?? [])],
    fieldsToInitialize: [...(init.fieldsToInitialize ?? [])],
    rawMethods: [...(init.rawMethods ?? [])],
    renamedMethods: new Map(init.renamedMethods ?? []),
    initializers: [...(init.initializers ?? [])],
    initialized: false,
    isClosed: genericParameterNames.length === 0 && (baseType?.isClosed ?? true),
    openType,
    genericArgumentValues: [],
    genericBindings: new Map(),
    closedTypes: new Map(),
    assignableTypes: null,
    reflectionCache: null,
    structFields: null,
    customCheck: null,
    runtimeType: null,
    enumInfo: null,
    elementType: null,
    get publicInterface(): PublicInterface {
      return publicInterface;
    },
  };

  const publicInterface: PublicInterface = {
    kind: "publicInterface",
    descriptor,
    staticTable,
    instanceTemplate,
    fields: new Map(),
  };

  return descriptor;
};

export const typeName = (type: TypeDescriptor): string => type.fullName;

/** Base chain starting with the type itself. */
export const baseChain = (type: TypeDescriptor): readonly TypeDescriptor[] => {
  const chain: TypeDescriptor[] = [];
  for (
    let current: TypeDescriptor | null = type;
    current !== null;
    current = current.baseType
  ) {
    chain.push(current);
  }
  return chain;
};
