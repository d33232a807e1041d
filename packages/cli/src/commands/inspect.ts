/**
 * Inspect command - describes the declared types of the loaded manifests
 */

import {
  ALL_MEMBERS,
  BindingFlags,
  assignableTypesOf,
  baseChain,
  buildAssignableSet,
  describeMember,
  describeTypeReference,
  fieldType,
  getMembers,
  getTypeByQualifiedName,
  isTypeModelError,
  resolveTypeReference,
  error,
  ok,
  type MemberInfo,
  type Result,
  type TypeDescriptor,
  type TypeRuntime,
} from "@typeforge/runtime";
import type { LoadedProject } from "./load.js";

export type TypeReport = {
  readonly name: string;
  readonly kind: string;
  readonly typeId: string;
  readonly loadUnit: string;
  /** Nearest base first. */
  readonly baseTypes: readonly string[];
  readonly interfaces: readonly string[];
  /** Every type a value of this type can be assigned to, sorted. */
  readonly assignableTo: readonly string[];
  readonly members: readonly string[];
};

const interfaceTypes = (
  runtime: TypeRuntime,
  type: TypeDescriptor
): readonly TypeDescriptor[] =>
  type.interfaces.flatMap((ref) => {
    const resolved = resolveTypeReference(runtime, ref, type.loadUnit);
    return resolved.kind === "type" ? [resolved] : [];
  });

const assignableNames = (runtime: TypeRuntime, type: TypeDescriptor): readonly string[] => {
  const ids = type.assignableTypes ?? buildAssignableSet(runtime, type);
  return assignableTypesOf(runtime, type)
    .filter((each) => ids.has(each.typeId))
    .map((each) => each.fullName)
    .sort();
};

const describeDeclaredMember = (runtime: TypeRuntime, member: MemberInfo): string => {
  const prefix = member.isStatic ? "static " : "";
  switch (member.record.kind) {
    case "field": {
      const resolved = fieldType(runtime, member);
      const typeName = resolved ? describeTypeReference(resolved) : "?";
      return `${prefix}${typeName} ${member.name}`;
    }
    case "property":
      return `${prefix}property ${member.name}`;
    case "method":
    case "constructor": {
      const suffix = member.record.data.isPlaceholder ? " [not implemented]" : "";
      return `${prefix}${describeMember(member)}${suffix}`;
    }
  }
};

/**
 * Summarize one built type.
 */
export const describeType = (runtime: TypeRuntime, type: TypeDescriptor): TypeReport => ({
  name: type.fullName,
  kind: type.typeKind,
  typeId: type.typeId,
  loadUnit: type.loadUnit.name,
  baseTypes: baseChain(type)
    .slice(1)
    .map((base) => base.fullName),
  interfaces: interfaceTypes(runtime, type).map((iface) => iface.fullName),
  assignableTo: assignableNames(runtime, type),
  members: getMembers(type, ALL_MEMBERS | BindingFlags.DeclaredOnly, {
    allowConstructors: true,
  }).map((member) => describeDeclaredMember(runtime, member)),
});

export const formatTypeReport = (report: TypeReport): string => {
  const list = (items: readonly string[]) => (items.length > 0 ? items.join(", ") : "(none)");
  const lines = [
    `${report.kind} ${report.name}`,
    `  load unit:     ${report.loadUnit}`,
    `  type id:       ${report.typeId}`,
    `  base types:    ${list(report.baseTypes)}`,
    `  interfaces:    ${list(report.interfaces)}`,
    `  assignable to: ${list(report.assignableTo)}`,
  ];
  if (report.members.length > 0) {
    lines.push("  members:");
    lines.push(...report.members.map((member) => `    ${member}`));
  }
  return lines.join("\n");
};

const selectTypes = (
  project: LoadedProject,
  typeName: string | undefined
): Result<readonly TypeDescriptor[], string> => {
  try {
    if (typeName === undefined) {
      return ok(project.handles.map((handle) => handle.get().descriptor));
    }
    const found = getTypeByQualifiedName(project.runtime, typeName);
    return found ? ok([found]) : error(`Type '${typeName}' was not found`);
  } catch (failure) {
    if (isTypeModelError(failure)) return error(failure.message);
    throw failure;
  }
};

/**
 * Build the reports for every declared type, or for `typeName` alone.
 * Returns the text to print.
 */
export const inspectCommand = (
  project: LoadedProject,
  options: { readonly typeName?: string; readonly json?: boolean } = {}
): Result<string, string> => {
  const types = selectTypes(project, options.typeName);
  if (!types.ok) return types;

  const reports = types.value.map((type) => describeType(project.runtime, type));
  return ok(
    options.json
      ? JSON.stringify(reports, null, 2)
      : reports.map(formatTypeReport).join("\n\n")
  );
};
