/**
 * Reflection metadata
 *
 * Member infos are materialized per type on first query from the member
 * records declared at registration time.
 */

import { isAssignable } from "../assignability/assignable-set.js";
import { applyMemberHiding } from "../dispatch/member-hiding.js";
import { resolveInContext, resolveSignature } from "../generics/resolve.js";
import { fail } from "../host/reporting.js";
import { signatureToString } from "../model/method-signature.js";
import type {
  MemberInfo,
  MemberInfoType,
  MemberRecord,
  TypeArgument,
  TypeDescriptor,
  TypeRuntime,
} from "../model/types.js";

export const BindingFlags = {
  Default: 0,
  IgnoreCase: 1,
  DeclaredOnly: 2,
  Instance: 4,
  Static: 8,
  Public: 16,
  NonPublic: 32,
  FlattenHierarchy: 64,
} as const;

export const ALL_MEMBERS =
  BindingFlags.Instance |
  BindingFlags.Static |
  BindingFlags.Public |
  BindingFlags.NonPublic;

const MEMBER_INFO_TYPES: Readonly<Record<MemberRecord["kind"], MemberInfoType>> = {
  field: "FieldInfo",
  method: "MethodInfo",
  constructor: "ConstructorInfo",
  property: "PropertyInfo",
};

export const getReflectionCache = (
  type: TypeDescriptor
): readonly MemberInfo[] => {
  if (type.reflectionCache) return type.reflectionCache;

  const cache = type.members.map(
    (record): MemberInfo => ({
      kind: "memberInfo",
      memberType: MEMBER_INFO_TYPES[record.kind],
      name: record.descriptor.name,
      declaringType: type,
      record,
      isStatic: record.descriptor.isStatic,
      isPublic: record.descriptor.isPublic,
      isSpecialName: record.descriptor.isSpecialName,
    })
  );
  type.reflectionCache = cache;
  return cache;
};

export type MemberQuery = {
  readonly memberType?: MemberInfoType;
  readonly name?: string;
  /** Include special-name members alongside ordinary methods. */
  readonly allowConstructors?: boolean;
};

/**
 * Members visible on a type, base members first. Public and NonPublic
 * together, like Static and Instance together, filter nothing.
 */
export const getMembers = (
  type: TypeDescriptor,
  flags: number,
  query: MemberQuery = {}
): readonly MemberInfo[] => {
  const constructorsOnly = query.memberType === "ConstructorInfo";
  const allowInherited = (flags & BindingFlags.DeclaredOnly) === 0;

  let publicOnly = (flags & BindingFlags.Public) !== 0;
  let nonPublicOnly = (flags & BindingFlags.NonPublic) !== 0;
  if (publicOnly && nonPublicOnly) publicOnly = nonPublicOnly = false;

  let staticOnly = (flags & BindingFlags.Static) !== 0;
  let instanceOnly = (flags & BindingFlags.Instance) !== 0;
  if (staticOnly && instanceOnly) staticOnly = instanceOnly = false;

  let members: readonly MemberInfo[] = [];
  for (
    let target: TypeDescriptor | null = type;
    target !== null;
    target = allowInherited ? target.baseType : null
  ) {
    members = [...getReflectionCache(target), ...members];
  }

  return members.filter((member) => {
    if (member.isSpecialName) {
      if (!query.allowConstructors && !constructorsOnly) return false;
    } else if (constructorsOnly) {
      return false;
    }

    if (publicOnly && !member.isPublic) return false;
    if (nonPublicOnly && member.isPublic) return false;
    if (staticOnly && !member.isStatic) return false;
    if (instanceOnly && member.isStatic) return false;

    if (
      query.memberType !== undefined &&
      member.memberType !== query.memberType &&
      !(query.allowConstructors && member.memberType === "ConstructorInfo")
    ) {
      return false;
    }

    return query.name === undefined || member.name === query.name;
  });
};

/**
 * The single method a name resolves to after hiding; more than one survivor
 * is ambiguous.
 */
export const getMethod = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  name: string,
  flags: number = BindingFlags.Public | BindingFlags.Instance | BindingFlags.Static
): MemberInfo | null => {
  const methods = applyMemberHiding(
    runtime,
    type,
    getMembers(type, flags, { memberType: "MethodInfo", name })
  );
  if (methods.length > 1) {
    throw fail(
      runtime,
      "TFG2008",
      `Multiple methods named '${name}' on type '${type.fullName}'.`,
      { subject: type.fullName, candidates: methods.map(describeMember) }
    );
  }
  return methods[0] ?? null;
};

/**
 * Visible methods in declaration order. Hiding applies within each
 * (static, name) group only.
 */
export const getMethods = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  flags: number = BindingFlags.Public | BindingFlags.Instance | BindingFlags.Static
): readonly MemberInfo[] => {
  const methods = getMembers(type, flags, { memberType: "MethodInfo" });

  const groups = new Map<string, MemberInfo[]>();
  for (const method of methods) {
    const key = `${method.isStatic ? "static" : "instance"}$${method.record.descriptor.escapedName}`;
    const group = groups.get(key);
    if (group) {
      group.push(method);
    } else {
      groups.set(key, [method]);
    }
  }

  const visible = new Set<MemberInfo>();
  for (const group of groups.values()) {
    for (const member of applyMemberHiding(runtime, type, group)) visible.add(member);
  }
  return methods.filter((method) => visible.has(method));
};

export const getField = (
  type: TypeDescriptor,
  name: string,
  flags: number = ALL_MEMBERS
): MemberInfo | null =>
  getMembers(type, flags, { memberType: "FieldInfo", name })[0] ?? null;

export const getFields = (
  type: TypeDescriptor,
  flags: number = ALL_MEMBERS
): readonly MemberInfo[] => getMembers(type, flags, { memberType: "FieldInfo" });

export const getProperty = (
  type: TypeDescriptor,
  name: string,
  flags: number = ALL_MEMBERS
): MemberInfo | null =>
  getMembers(type, flags, { memberType: "PropertyInfo", name })[0] ?? null;

export const getConstructors = (
  type: TypeDescriptor,
  flags: number = BindingFlags.Public | BindingFlags.Instance
): readonly MemberInfo[] =>
  getMembers(type, flags | BindingFlags.DeclaredOnly, {
    memberType: "ConstructorInfo",
  });

// ═══════════════════════════════════════════════════════════════════════════
// RESOLVED TYPE INFORMATION
// ═══════════════════════════════════════════════════════════════════════════

export const fieldType = (
  runtime: TypeRuntime,
  member: MemberInfo
): TypeArgument | null =>
  member.record.kind === "field"
    ? resolveInContext(runtime, member.record.data.fieldType, member.declaringType)
    : null;

export const methodReturnType = (
  runtime: TypeRuntime,
  member: MemberInfo
): TypeArgument | null => {
  const record = member.record;
  if (record.kind !== "method" && record.kind !== "constructor") return null;
  return resolveSignature(runtime, record.data.signature, member.declaringType).returnType;
};

export const methodParameterTypes = (
  runtime: TypeRuntime,
  member: MemberInfo
): readonly TypeArgument[] => {
  const record = member.record;
  if (record.kind !== "method" && record.kind !== "constructor") return [];
  return resolveSignature(runtime, record.data.signature, member.declaringType)
    .argumentTypes;
};

export const describeMember = (member: MemberInfo): string => {
  const record = member.record;
  switch (record.kind) {
    case "method":
    case "constructor":
      return signatureToString(record.data.signature, member.name);
    default:
      return member.name;
  }
};

export const isSubclassOf = (
  type: TypeDescriptor,
  candidateBase: TypeDescriptor
): boolean => {
  for (let current = type.baseType; current !== null; current = current.baseType) {
    if (current.typeId === candidateBase.typeId) return true;
  }
  return false;
};

export const isAssignableFrom = (
  runtime: TypeRuntime,
  target: TypeDescriptor,
  source: TypeDescriptor
): boolean => isAssignable(runtime, source, target);
