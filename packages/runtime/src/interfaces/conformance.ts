/**
 * Interface conformance fixup
 *
 * For every interface a type claims, each declared member must be reachable
 * on the instance template by its bare name or by its interface-qualified
 * name (`IComparable_CompareTo`). Where only the bare name exists, the
 * qualified name is aliased to it so that interface-typed call sites keep
 * working after an unrelated member of the same bare name shadows it.
 *
 * Missing members are a warning, not an error: partially ported libraries
 * still load.
 */

import { typeRefGet } from "../generics/resolve.js";
import { warn } from "../host/reporting.js";
import { isEmptyEntry, lookupEntry, setEntry } from "../model/member-table.js";
import type {
  InterfaceMemberKind,
  MemberTable,
  TableEntry,
  TypeDescriptor,
  TypeReference,
  TypeRuntime,
} from "../model/types.js";
import { interfaceQualifiedKey } from "../naming/names.js";
import { findTypeByName } from "../registry/name-registry.js";

const resolveInterface = (
  runtime: TypeRuntime,
  type: TypeDescriptor,
  ref: TypeReference
): TypeDescriptor | null => {
  if (typeof ref === "string") {
    const found = findTypeByName(runtime, ref, type.loadUnit);
    if (!found) {
      warn(
        runtime,
        "TFG3003",
        `Type '${type.fullName}' implements an undefined interface named '${ref}'.`,
        type.fullName
      );
      return null;
    }
    return found.descriptor;
  }

  switch (ref.kind) {
    case "typeRef":
      return typeRefGet(runtime, ref).descriptor;
    case "publicInterface":
      return ref.descriptor;
    case "type":
      return ref;
    default:
      warn(
        runtime,
        "TFG3003",
        `Type '${type.fullName}' implements the unbound generic parameter '${ref.typeId}'.`,
        type.fullName
      );
      return null;
  }
};

/**
 * Whether an entry counts as an implementation. External placeholders count:
 * they stand in for a member that exists, even if nobody has written it yet.
 */
const implementsMember = (
  entry: TableEntry | undefined,
  kind: InterfaceMemberKind
): boolean => {
  if (entry === undefined || isEmptyEntry(entry)) return false;
  return kind === "property"
    ? entry.kind === "accessor" || entry.kind === "value"
    : entry.kind === "function" || entry.kind === "value";
};

const aliasMember = (
  template: MemberTable,
  kind: InterfaceMemberKind,
  bareKey: string,
  qualifiedKey: string,
  bare: TableEntry
): void => {
  setEntry(
    template,
    qualifiedKey,
    kind === "method" ? { kind: "alias", table: template, key: bareKey } : bare
  );
};

export const fixupInterfaces = (
  runtime: TypeRuntime,
  type: TypeDescriptor
): void => {
  if (type.typeKind === "interface") return;
  const template = type.publicInterface.instanceTemplate;

  const missing: string[] = [];
  const resolved: TypeReference[] = [];

  for (const ref of type.interfaces) {
    const iface = resolveInterface(runtime, type, ref);
    if (!iface) continue;
    if (!resolved.includes(iface)) resolved.push(iface);

    if (iface.typeKind !== "interface") {
      warn(
        runtime,
        "TFG3002",
        `Type '${iface.fullName}' is not an interface.`,
        type.fullName
      );
      continue;
    }
    if (!template) continue;

    for (const [key, kind] of iface.interfaceMembers) {
      const qualified = interfaceQualifiedKey(iface.fullNameWithoutArguments, key);
      const bare = lookupEntry(template, key);
      const hasBare = implementsMember(bare, kind);
      const hasQualified = implementsMember(lookupEntry(template, qualified), kind);

      if (!hasBare && !hasQualified) {
        missing.push(qualified);
      } else if (!hasQualified && bare !== undefined) {
        aliasMember(template, kind, key, qualified, bare);
      }
    }
  }

  type.interfaces = resolved;

  if (missing.length > 0 && !runtime.options.suppressInterfaceWarnings) {
    warn(
      runtime,
      "TFG3001",
      `Type '${type.fullName}' is missing implementation of interface member(s): ${missing.join(", ")}`,
      type.fullName
    );
  }
};
